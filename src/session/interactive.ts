import * as readline from 'node:readline';

import { CommandParseError, InvalidCommandError, parseCommandToken } from '@/services/ble/commandEncoder';
import type { ActuationCommand } from '@/types/device';
import { formatWrite } from '@/utils/formatters';
import { logger } from '@/utils/logger';

export interface InteractiveOptions {
  input: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  terminal?: boolean;
  defaultChannel: number | null;
  write: (command: ActuationCommand) => Promise<void>;
  print: (line: string) => void;
  signal?: AbortSignal;
}

const QUIT = 'q';

const handleLine = async (line: string, { defaultChannel, write, print }: InteractiveOptions) => {
  let command: ActuationCommand;
  try {
    command = parseCommandToken(line, defaultChannel);
  } catch (error) {
    if (error instanceof CommandParseError) {
      print('Invalid input (use 0.5 or 2:0.5)');
      return;
    }
    if (error instanceof InvalidCommandError) {
      print(error.message);
      return;
    }
    throw error;
  }

  try {
    await write(command);
    print(formatWrite(command));
  } catch (error) {
    logger.warn('Write failed', error);
    print(`Write failed: ${error instanceof Error ? error.message : String(error)}`);
  }
};

/**
 * Reads `value` or `channel:value` lines until `q`, end of input, Ctrl+C or
 * abort. Each write completes before the next line is handled.
 */
export const runInteractive = async (options: InteractiveOptions) => {
  const { input, output, terminal, defaultChannel, print, signal } = options;
  const hint = defaultChannel === null ? ' or ch:value for a specific channel' : '';
  print(`Enter values 0.0-1.0${hint} (q to quit):`);

  const rl = readline.createInterface({ input, output, terminal: terminal ?? false, prompt: '> ' });
  let closed = false;
  const close = () => rl.close();
  rl.on('close', () => {
    closed = true;
  });
  rl.on('SIGINT', close);
  signal?.addEventListener('abort', close, { once: true });

  try {
    rl.prompt();
    for await (const raw of rl) {
      const line = raw.trim();
      if (line.toLowerCase() === QUIT) {
        break;
      }
      if (line) {
        await handleLine(line, options);
      }
      if (!closed) {
        rl.prompt();
      }
    }
  } finally {
    signal?.removeEventListener('abort', close);
    rl.close();
  }
};
