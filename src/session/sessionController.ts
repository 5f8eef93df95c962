import { type BleProfile, bleProfile } from '@/config/bleProfile';
import { appConfig } from '@/config/appConfig';
import {
  CredentialsNotFoundError,
  defaultCredentialSources,
  describeMissingCredentials,
  resolveCredentials,
} from '@/services/credentials/credentialResolver';
import { refreshAccessToken } from '@/services/credentials/tokenRefresher';
import type { CredentialSource } from '@/services/credentials/types';
import { discoverDevice } from '@/services/ble/discovery';
import type { BleTransport } from '@/services/ble/types';
import { fetchUsage } from '@/services/usage/usageClient';
import { type WatchCycleDeps, runWatchLoop } from '@/services/usage/watchLoop';
import { createSessionStore } from '@/state/sessionStore';
import type { ActuationCommand } from '@/types/device';
import type { TokenState } from '@/types/usage';
import { formatWrite } from '@/utils/formatters';
import { logger } from '@/utils/logger';

import { runInteractive } from './interactive';

export type SessionMode =
  | { kind: 'single'; command: ActuationCommand }
  | { kind: 'interactive' }
  | { kind: 'watch'; intervalSeconds: number };

export type UsageDeps = Pick<WatchCycleDeps, 'fetchUsage' | 'refreshToken'>;

export interface SessionOptions {
  transport: BleTransport;
  mode: SessionMode;
  signal: AbortSignal;
  debug?: boolean;
  defaultChannel?: number | null;
  profile?: BleProfile;
  scanTimeoutMs?: number;
  print?: (line: string) => void;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  terminal?: boolean;
  credentialSources?: CredentialSource[];
  usage?: UsageDeps;
}

const toTokenState = ({ accessToken, refreshToken }: TokenState): TokenState => ({ accessToken, refreshToken });

const defaultUsageDeps = (signal: AbortSignal): UsageDeps => ({
  fetchUsage: (accessToken) => fetchUsage(accessToken, { signal }),
  refreshToken: (refreshToken) => refreshAccessToken(refreshToken, { signal }),
});

type Write = (command: ActuationCommand) => Promise<void>;
type ModeRunner = (write: Write) => Promise<void>;

interface ModeContext {
  mode: SessionMode;
  signal: AbortSignal;
  print: (line: string) => void;
  defaultChannel: number | null;
  credentialSources: CredentialSource[];
  usage: UsageDeps;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  terminal?: boolean;
}

/**
 * Everything a mode needs that does not touch the peripheral is settled
 * here, so that missing credentials end the run before any scan starts.
 */
const prepareMode = async (options: ModeContext): Promise<ModeRunner | null> => {
  const { mode, signal, print, defaultChannel, credentialSources, usage } = options;

  switch (mode.kind) {
    case 'single':
      return async (write) => {
        await write(mode.command);
        print(formatWrite(mode.command));
      };
    case 'interactive':
      return (write) =>
        runInteractive({
          input: options.input ?? process.stdin,
          output: options.output,
          terminal: options.terminal,
          defaultChannel,
          write,
          print,
          signal,
        });
    case 'watch': {
      let tokens: TokenState;
      try {
        tokens = toTokenState(await resolveCredentials(credentialSources));
      } catch (error) {
        if (error instanceof CredentialsNotFoundError) {
          describeMissingCredentials(error).forEach((line) => print(line));
          return null;
        }
        throw error;
      }

      return async (write) => {
        await runWatchLoop({
          tokens,
          intervalMs: mode.intervalSeconds * 1000,
          channel: defaultChannel,
          signal,
          write,
          print,
          ...usage,
          reloadCredentials: async () => toTokenState(await resolveCredentials(credentialSources)),
        });
      };
    }
  }
};

/**
 * One run: find the controller, hold a single connection for the chosen
 * mode, always disconnect. Resolves to the process exit code.
 */
export const runSession = async (options: SessionOptions): Promise<number> => {
  const {
    transport,
    signal,
    debug = false,
    profile = bleProfile,
    scanTimeoutMs = appConfig.scanTimeoutMs,
    print = console.log,
  } = options;

  const runMode = await prepareMode({
    mode: options.mode,
    signal,
    print,
    input: options.input,
    output: options.output,
    terminal: options.terminal,
    defaultChannel: options.defaultChannel ?? null,
    credentialSources: options.credentialSources ?? defaultCredentialSources(),
    usage: options.usage ?? defaultUsageDeps(signal),
  });
  if (!runMode) {
    return 1;
  }

  const device = await discoverDevice(transport, { timeoutMs: scanTimeoutMs, debug, profile, print, signal });
  if (signal.aborted) {
    return 0;
  }
  if (!device) {
    print(`Device not found. Make sure the ${profile.deviceName} peripheral is powered and advertising.`);
    return 1;
  }
  print(`Found ${profile.deviceName} at ${device.address}`);

  const store = createSessionStore();
  const connection = await transport.connect(device);
  store.getState().registerWriter({
    writeCommand: (payload) => connection.writeCharacteristic(profile.characteristicUuid, payload),
  });

  try {
    await runMode(store.getState().requestWrite);
  } finally {
    store.getState().registerWriter(null);
    try {
      await connection.disconnect();
    } catch (error) {
      logger.warn('Disconnect failed', error);
    }
    logger.ble(`session closed after ${store.getState().writesCompleted} write(s)`);
    print('Disconnected.');
  }

  return 0;
};
