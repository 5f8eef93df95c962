import { appConfig } from '@/config/appConfig';
import { type UsageProfile, usageProfile } from '@/config/usageProfile';
import type { RefreshedToken } from '@/types/usage';
import { createRequestSignal } from '@/utils/abort';
import { asRecord, coerceNonEmptyString } from '@/utils/coerce';
import { logger } from '@/utils/logger';

import { type HttpClientOptions, readJson } from '../http';

export interface TokenRefreshOptions extends HttpClientOptions {
  profile?: UsageProfile;
}

/**
 * Exchanges a refresh token for a new access token. Every failure (network,
 * HTTP status, unreadable body) yields null; the caller decides what follows.
 */
export const refreshAccessToken = async (
  refreshToken: string,
  {
    fetchImpl = fetch,
    timeoutMs = appConfig.httpTimeoutMs,
    signal,
    profile = usageProfile,
  }: TokenRefreshOptions = {},
): Promise<RefreshedToken | null> => {
  const request = createRequestSignal(timeoutMs, signal);

  try {
    const res = await fetchImpl(profile.tokenUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        grant_type: 'refresh_token',
        refresh_token: refreshToken,
        client_id: profile.clientId,
      }),
      signal: request.signal,
    });

    if (!res.ok) {
      logger.warn(`Token refresh failed: HTTP ${res.status} ${res.statusText}`);
      return null;
    }

    const body = asRecord(await readJson(res));
    const accessToken = coerceNonEmptyString(body?.access_token);
    if (!accessToken) {
      logger.warn('Token refresh response carried no access_token');
      return null;
    }

    logger.auth('access token refreshed');
    return {
      accessToken,
      refreshToken: coerceNonEmptyString(body?.refresh_token),
    };
  } catch (error) {
    logger.warn('Token refresh request failed', error);
    return null;
  } finally {
    request.dispose();
  }
};
