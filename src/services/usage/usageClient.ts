import { appConfig } from '@/config/appConfig';
import { type UsageProfile, usageProfile } from '@/config/usageProfile';
import type { UsageFetchResult, UsageSnapshot } from '@/types/usage';
import { createRequestSignal } from '@/utils/abort';
import { asRecord, coerceDate, coerceNumber } from '@/utils/coerce';
import { logger } from '@/utils/logger';

import { type HttpClientOptions, readJson } from '../http';

export class UsageRequestError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
  ) {
    super(message);
    this.name = 'UsageRequestError';
  }
}

export interface UsageClientOptions extends HttpClientOptions {
  profile?: UsageProfile;
}

const USAGE_WINDOW_KEY = 'five_hour';

export const parseUsagePayload = (body: unknown): UsageSnapshot => {
  const usageWindow = asRecord(asRecord(body)?.[USAGE_WINDOW_KEY]);
  return {
    utilizationPercent: coerceNumber(usageWindow?.utilization),
    resetsAt: coerceDate(usageWindow?.resets_at),
  };
};

/**
 * Reads the five-hour usage window. A 401 comes back as `authExpired` so the
 * caller can refresh; any other HTTP failure throws `UsageRequestError`.
 */
export const fetchUsage = async (
  accessToken: string,
  {
    fetchImpl = fetch,
    timeoutMs = appConfig.httpTimeoutMs,
    signal,
    profile = usageProfile,
  }: UsageClientOptions = {},
): Promise<UsageFetchResult> => {
  const request = createRequestSignal(timeoutMs, signal);

  try {
    const res = await fetchImpl(profile.usageUrl, {
      method: 'GET',
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/json',
        'User-Agent': profile.userAgent,
        Authorization: `Bearer ${accessToken}`,
        'anthropic-beta': profile.betaHeader,
      },
      signal: request.signal,
    });

    if (res.status === 401) {
      logger.usage('access token rejected (401)');
      return { snapshot: null, authExpired: true };
    }

    if (!res.ok) {
      throw new UsageRequestError(`Usage request failed: HTTP ${res.status} ${res.statusText}`.trim(), res.status);
    }

    const body = await readJson(res);
    if (body === undefined) {
      throw new UsageRequestError('Usage endpoint returned a non-JSON payload', res.status);
    }

    const snapshot = parseUsagePayload(body);
    logger.usage('usage snapshot', snapshot);
    return { snapshot, authExpired: false };
  } finally {
    request.dispose();
  }
};
