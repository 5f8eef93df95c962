import { describe, expect, it } from 'vitest';

import { refreshAccessToken } from '@/services/credentials/tokenRefresher';
import type { FetchLike } from '@/services/http';
import { UsageRequestError, fetchUsage, parseUsagePayload } from '@/services/usage/usageClient';

interface RecordedRequest {
  url: string;
  init?: RequestInit;
}

const stubFetch = (respond: () => Response | Promise<Response>) => {
  const requests: RecordedRequest[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    requests.push({ url, init });
    return respond();
  };
  return { fetchImpl, requests };
};

const json = (status: number, body: unknown) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('fetchUsage', () => {
  it('sends the bearer token and fixed headers', async () => {
    const { fetchImpl, requests } = stubFetch(() => json(200, { five_hour: { utilization: 42.5 } }));

    const result = await fetchUsage('test-token', { fetchImpl });

    expect(result).toEqual({ snapshot: { utilizationPercent: 42.5, resetsAt: null }, authExpired: false });
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('https://api.anthropic.com/api/oauth/usage');
    expect(requests[0].init?.method).toBe('GET');
    expect(requests[0].init?.headers).toEqual({
      Accept: 'application/json',
      'Content-Type': 'application/json',
      'User-Agent': 'claude-code/2.1.1',
      Authorization: 'Bearer test-token',
      'anthropic-beta': 'oauth-2025-04-20',
    });
  });

  it('parses the reset timestamp when present', async () => {
    const { fetchImpl } = stubFetch(() =>
      json(200, { five_hour: { utilization: 10, resets_at: '2026-01-01T12:00:00Z' } }),
    );

    const { snapshot } = await fetchUsage('test-token', { fetchImpl });

    expect(snapshot?.resetsAt?.toISOString()).toBe('2026-01-01T12:00:00.000Z');
  });

  it('maps 401 to an auth-expired signal', async () => {
    const { fetchImpl } = stubFetch(() => json(401, { error: 'expired' }));

    await expect(fetchUsage('old-token', { fetchImpl })).resolves.toEqual({ snapshot: null, authExpired: true });
  });

  it('propagates other HTTP failures', async () => {
    const { fetchImpl } = stubFetch(() => json(503, { error: 'unavailable' }));

    const error = await fetchUsage('test-token', { fetchImpl }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UsageRequestError);
    expect(error).toMatchObject({ status: 503 });
  });

  it('rejects a body that is not JSON', async () => {
    const { fetchImpl } = stubFetch(() => new Response('<html>', { status: 200 }));

    await expect(fetchUsage('test-token', { fetchImpl })).rejects.toThrow('non-JSON');
  });

  it('propagates transport errors', async () => {
    const { fetchImpl } = stubFetch(() => {
      throw new TypeError('fetch failed');
    });

    await expect(fetchUsage('test-token', { fetchImpl })).rejects.toThrow('fetch failed');
  });
});

describe('parseUsagePayload', () => {
  it('yields no utilization when the window is missing', () => {
    expect(parseUsagePayload({ seven_day: { utilization: 12 } })).toEqual({ utilizationPercent: null, resetsAt: null });
  });

  it('coerces numeric strings', () => {
    expect(parseUsagePayload({ five_hour: { utilization: '73.2', resets_at: 'soon' } })).toEqual({
      utilizationPercent: 73.2,
      resetsAt: null,
    });
  });
});

describe('refreshAccessToken', () => {
  it('posts the refresh grant and returns the new token', async () => {
    const { fetchImpl, requests } = stubFetch(() => json(200, { access_token: 'new-token', expires_in: 3600 }));

    const refreshed = await refreshAccessToken('test-refresh', { fetchImpl });

    expect(refreshed).toEqual({ accessToken: 'new-token', refreshToken: null });
    expect(requests[0].url).toBe('https://console.anthropic.com/api/oauth/token');
    expect(requests[0].init?.method).toBe('POST');
    expect(JSON.parse(String(requests[0].init?.body))).toEqual({
      grant_type: 'refresh_token',
      refresh_token: 'test-refresh',
      client_id: '9d1c250a-e61b-44d9-88ed-5944d1962f5e',
    });
  });

  it('keeps a rotated refresh token', async () => {
    const { fetchImpl } = stubFetch(() => json(200, { access_token: 'new-token', refresh_token: 'rotated-refresh' }));

    await expect(refreshAccessToken('test-refresh', { fetchImpl })).resolves.toEqual({
      accessToken: 'new-token',
      refreshToken: 'rotated-refresh',
    });
  });

  it('returns null on HTTP errors', async () => {
    const { fetchImpl } = stubFetch(() => json(400, { error: 'invalid_grant' }));

    await expect(refreshAccessToken('test-refresh', { fetchImpl })).resolves.toBeNull();
  });

  it('returns null on transport errors', async () => {
    const { fetchImpl } = stubFetch(() => {
      throw new TypeError('fetch failed');
    });

    await expect(refreshAccessToken('test-refresh', { fetchImpl })).resolves.toBeNull();
  });

  it('returns null when the response has no access token', async () => {
    const { fetchImpl } = stubFetch(() => json(200, { token_type: 'bearer' }));

    await expect(refreshAccessToken('test-refresh', { fetchImpl })).resolves.toBeNull();
  });
});
