import { createActuationCommand } from '@/services/ble/commandEncoder';
import type { ActuationCommand } from '@/types/device';
import type { RefreshedToken, TokenState, UsageFetchResult } from '@/types/usage';
import { delay } from '@/utils/abort';
import { logger } from '@/utils/logger';
import { remainingFraction } from '@/utils/math';

import { formatGaugeLine, formatWarningLine } from './gauge';

export interface WatchCycleDeps {
  fetchUsage: (accessToken: string) => Promise<UsageFetchResult>;
  refreshToken: (refreshToken: string) => Promise<RefreshedToken | null>;
  /** Re-reads stored credentials after a failed refresh, for the next cycle. */
  reloadCredentials?: () => Promise<TokenState>;
  write: (command: ActuationCommand) => Promise<void>;
  channel: number | null;
  print: (line: string) => void;
  now?: () => Date;
  /** Once aborted, failures are no longer reported. */
  signal?: AbortSignal;
}

type SkipReason = 'no-data' | 'auth-failed' | 'fetch-failed';

export type CycleOutcome =
  | { kind: 'written'; utilizationPercent: number; command: ActuationCommand }
  | { kind: 'skipped'; reason: SkipReason }
  | { kind: 'write-failed'; message: string };

export interface CycleResult {
  tokens: TokenState;
  outcome: CycleOutcome;
}

type FetchAttempt =
  | { tokens: TokenState; result: UsageFetchResult }
  | { tokens: TokenState; result: null; reason: 'auth-failed' | 'fetch-failed' };

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

const reload = async (tokens: TokenState, deps: WatchCycleDeps): Promise<TokenState> => {
  if (!deps.reloadCredentials) {
    return tokens;
  }
  try {
    return await deps.reloadCredentials();
  } catch (error) {
    logger.warn('Reloading stored credentials failed', error);
    return tokens;
  }
};

const tryFetch = async (accessToken: string, deps: WatchCycleDeps): Promise<UsageFetchResult | null> => {
  try {
    return await deps.fetchUsage(accessToken);
  } catch (error) {
    if (!deps.signal?.aborted) {
      logger.warn('Usage fetch failed', error);
    }
    return null;
  }
};

const tryRefresh = async (refreshToken: string, deps: WatchCycleDeps): Promise<RefreshedToken | null> => {
  try {
    return await deps.refreshToken(refreshToken);
  } catch (error) {
    logger.warn('Token refresh failed', error);
    return null;
  }
};

/**
 * Fetch, refreshing at most once on auth expiry. A successful refresh is kept
 * even when the re-fetch fails.
 */
const fetchWithRefresh = async (tokens: TokenState, deps: WatchCycleDeps): Promise<FetchAttempt> => {
  const first = await tryFetch(tokens.accessToken, deps);
  if (!first) {
    return { tokens, result: null, reason: 'fetch-failed' };
  }
  if (!first.authExpired) {
    return { tokens, result: first };
  }

  if (!tokens.refreshToken) {
    logger.warn('Access token expired and no refresh token is available');
    return { tokens, result: null, reason: 'auth-failed' };
  }

  const refreshed = await tryRefresh(tokens.refreshToken, deps);
  if (!refreshed) {
    if (deps.signal?.aborted) {
      return { tokens, result: null, reason: 'auth-failed' };
    }
    deps.print('  Token expired, refreshing... failed.');
    return { tokens: await reload(tokens, deps), result: null, reason: 'auth-failed' };
  }

  const next: TokenState = {
    accessToken: refreshed.accessToken,
    refreshToken: refreshed.refreshToken ?? tokens.refreshToken,
  };
  if (deps.signal?.aborted) {
    return { tokens: next, result: null, reason: 'auth-failed' };
  }
  deps.print('  Token expired, refreshing... done.');
  const second = await tryFetch(next.accessToken, deps);
  if (!second) {
    return { tokens: next, result: null, reason: 'fetch-failed' };
  }
  return second.authExpired ? { tokens: next, result: null, reason: 'auth-failed' } : { tokens: next, result: second };
};

export const runWatchCycle = async (tokens: TokenState, deps: WatchCycleDeps): Promise<CycleResult> => {
  const now = deps.now ?? (() => new Date());
  const skip = (next: TokenState, reason: SkipReason): CycleResult => {
    if (!deps.signal?.aborted) {
      deps.print(formatWarningLine(now(), 'Could not fetch usage'));
    }
    return { tokens: next, outcome: { kind: 'skipped', reason } };
  };

  const fetched = await fetchWithRefresh(tokens, deps);
  if (fetched.result === null) {
    return skip(fetched.tokens, fetched.reason);
  }

  const { result } = fetched;
  const utilizationPercent = result.snapshot?.utilizationPercent ?? null;
  if (utilizationPercent === null) {
    return skip(fetched.tokens, 'no-data');
  }

  const remaining = remainingFraction(utilizationPercent);
  let command: ActuationCommand;
  try {
    command = createActuationCommand(remaining, deps.channel);
    await deps.write(command);
  } catch (error) {
    const message = errorMessage(error);
    logger.warn('Gauge write failed', error);
    deps.print(formatWarningLine(now(), `Write failed: ${message}`));
    return { tokens: fetched.tokens, outcome: { kind: 'write-failed', message } };
  }

  deps.print(
    formatGaugeLine({
      at: now(),
      utilizationPercent,
      remaining,
      resetsAt: result.snapshot?.resetsAt,
    }),
  );
  return { tokens: fetched.tokens, outcome: { kind: 'written', utilizationPercent, command } };
};

export interface WatchLoopOptions extends WatchCycleDeps {
  tokens: TokenState;
  intervalMs: number;
  signal: AbortSignal;
  onCycle?: (result: CycleResult) => void;
}

/**
 * Polls usage and drives the gauge until `signal` aborts. Each cycle runs to
 * completion before the interval starts; the sleep ends early on abort.
 */
export const runWatchLoop = async ({ tokens, intervalMs, onCycle, ...deps }: WatchLoopOptions) => {
  const { signal } = deps;
  const channelLabel = deps.channel !== null ? ` (ch ${deps.channel})` : '';
  deps.print('');
  deps.print(`  Claude Code gauge${channelLabel} — polling every ${intervalMs / 1000}s (Ctrl+C to stop)`);
  deps.print('');

  let state = tokens;
  while (!signal.aborted) {
    const result = await runWatchCycle(state, deps);
    state = result.tokens;
    onCycle?.(result);

    if (signal.aborted || !(await delay(intervalMs, signal))) {
      break;
    }
  }

  logger.usage('watch loop stopped');
  return state;
};
