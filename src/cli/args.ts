import { bleProfile } from '@/config/bleProfile';
import { CommandParseError, InvalidCommandError, parseCommandToken } from '@/services/ble/commandEncoder';
import type { SessionMode } from '@/session/sessionController';

export class CliArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliArgumentError';
  }
}

export interface CliOptions {
  help: boolean;
  debug: boolean;
  defaultChannel: number | null;
  mode: SessionMode;
}

export const usageText = `galvo [value | channel:value] [options]

Drives the ${bleProfile.deviceName} galvanometer controller over Bluetooth LE.
Without a value and without --claudewatch an interactive prompt opens.

Options:
  --debug                 list every advertiser seen during the scan
  --channel <n>           default output channel (0-${bleProfile.maxChannel})
  --claudewatch <seconds> show remaining Claude Code usage, polled every <seconds>
  --help                  show this help

Environment:
  GALVO_USE_MOCK_BLE      use the simulated peripheral instead of the adapter
  GALVO_SCAN_TIMEOUT_MS   scan window (default 10000)
  GALVO_HTTP_TIMEOUT_MS   usage API timeout (default 10000)
  GALVO_VERBOSE           print diagnostic [BLE]/[USAGE]/[AUTH] lines
`;

const INTEGER = /^\d+$/;

/** Removes `flag` and its value from `args`; undefined when the flag is absent. */
const takeOption = (args: string[], flag: string, missingMessage: string): string | undefined => {
  const idx = args.indexOf(flag);
  if (idx === -1) {
    return undefined;
  }
  const value = args[idx + 1];
  if (value === undefined) {
    throw new CliArgumentError(missingMessage);
  }
  args.splice(idx, 2);
  return value;
};

const takeFlag = (args: string[], flag: string) => {
  const idx = args.indexOf(flag);
  if (idx === -1) {
    return false;
  }
  args.splice(idx, 1);
  return true;
};

export const parseCliArgs = (argv: string[]): CliOptions => {
  const args = [...argv];
  const longHelp = takeFlag(args, '--help');
  const shortHelp = takeFlag(args, '-h');
  const help = longHelp || shortHelp;
  const debug = takeFlag(args, '--debug');

  let defaultChannel: number | null = null;
  const channelArg = takeOption(args, '--channel', `--channel requires a channel number (0-${bleProfile.maxChannel})`);
  if (channelArg !== undefined) {
    const channel = Number.parseInt(channelArg, 10);
    if (!INTEGER.test(channelArg.trim()) || channel > bleProfile.maxChannel) {
      throw new CliArgumentError(`Invalid --channel value: ${channelArg}`);
    }
    defaultChannel = channel;
  }

  let watchSeconds: number | null = null;
  const watchArg = takeOption(args, '--claudewatch', '--claudewatch requires an interval in seconds');
  if (watchArg !== undefined) {
    const seconds = Number.parseInt(watchArg, 10);
    if (!INTEGER.test(watchArg.trim()) || seconds <= 0) {
      throw new CliArgumentError(`Invalid --claudewatch interval: ${watchArg}`);
    }
    watchSeconds = seconds;
  }

  const unknown = args.find((arg) => arg.startsWith('--'));
  if (unknown) {
    throw new CliArgumentError(`Unknown option: ${unknown}`);
  }

  if (watchSeconds !== null) {
    return { help, debug, defaultChannel, mode: { kind: 'watch', intervalSeconds: watchSeconds } };
  }

  const [token] = args;
  if (token === undefined) {
    return { help, debug, defaultChannel, mode: { kind: 'interactive' } };
  }

  try {
    return { help, debug, defaultChannel, mode: { kind: 'single', command: parseCommandToken(token, defaultChannel) } };
  } catch (error) {
    if (error instanceof CommandParseError) {
      throw new CliArgumentError(`Invalid value: ${token} (use 0.5 or 2:0.5)`);
    }
    if (error instanceof InvalidCommandError) {
      throw new CliArgumentError(error.message);
    }
    throw error;
  }
};
