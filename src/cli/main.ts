import { appConfig } from '@/config/appConfig';
import { bleProfile } from '@/config/bleProfile';
import { createDemoAdvertisers, createMockBleTransport } from '@/services/ble/mockBleTransport';
import type { BleTransport } from '@/services/ble/types';
import { runSession } from '@/session/sessionController';
import { logger, setVerboseLogging } from '@/utils/logger';

import { CliArgumentError, type CliOptions, parseCliArgs, usageText } from './args';

export interface CliDeps {
  createTransport?: () => Promise<BleTransport>;
  print?: (line: string) => void;
  printError?: (line: string) => void;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

const createTransport = async (): Promise<BleTransport> => {
  if (appConfig.useMockBleTransport) {
    logger.ble('using simulated peripheral');
    return createMockBleTransport(createDemoAdvertisers(bleProfile), { writeDelayMs: 140 });
  }
  // Loaded lazily: noble binds to the adapter as soon as it is imported.
  const { createNobleTransport } = await import('@/services/ble/nobleTransport');
  return createNobleTransport(bleProfile);
};

/** Parses `argv`, runs one session and resolves to the process exit code. */
export const runCli = async (argv: string[], deps: CliDeps = {}): Promise<number> => {
  const { print = console.log, printError = console.error } = deps;

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliArgumentError) {
      printError(error.message);
      return 1;
    }
    throw error;
  }

  if (options.help) {
    print(usageText);
    return 0;
  }

  setVerboseLogging(appConfig.verboseLogging || options.debug);

  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  try {
    return await runSession({
      transport: await (deps.createTransport ?? createTransport)(),
      mode: options.mode,
      debug: options.debug,
      defaultChannel: options.defaultChannel,
      signal: controller.signal,
      print,
      input: deps.input ?? process.stdin,
      output: deps.output ?? process.stdout,
      terminal: deps.input ? false : process.stdin.isTTY === true,
    });
  } finally {
    process.removeListener('SIGINT', stop);
    process.removeListener('SIGTERM', stop);
  }
};
