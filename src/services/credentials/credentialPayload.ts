import { usageProfile } from '@/config/usageProfile';
import type { Credentials } from '@/types/usage';
import { asRecord, coerceNonEmptyString } from '@/utils/coerce';

/**
 * Reads the OAuth block out of a stored credentials document. Returns null
 * unless the text is JSON with a non-empty access token under the OAuth key.
 */
export const parseCredentialPayload = (
  raw: string,
  sourceLocation: string,
  oauthKey = usageProfile.oauthKey,
): Credentials | null => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  const oauth = asRecord(asRecord(parsed)?.[oauthKey]);
  const accessToken = coerceNonEmptyString(oauth?.accessToken);
  if (!oauth || !accessToken) {
    return null;
  }

  return {
    accessToken,
    refreshToken: coerceNonEmptyString(oauth.refreshToken),
    sourceLocation,
  };
};
