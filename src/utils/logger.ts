import { appConfig } from '@/config/appConfig';

let verbose = appConfig.verboseLogging;

export const setVerboseLogging = (enabled: boolean) => {
  verbose = enabled;
};

const trace = (tag: string, message: string, data?: unknown) => {
  if (!verbose) {
    return;
  }
  if (data === undefined) {
    console.debug(`[${tag}] ${message}`);
  } else {
    console.debug(`[${tag}] ${message}`, data);
  }
};

export const logger = {
  ble: (message: string, data?: unknown) => trace('BLE', message, data),
  usage: (message: string, data?: unknown) => trace('USAGE', message, data),
  auth: (message: string, data?: unknown) => trace('AUTH', message, data),
  warn: (message: string, error?: unknown) => {
    if (error === undefined) {
      console.warn(`[WARN] ${message}`);
    } else {
      console.warn(`[WARN] ${message}`, error);
    }
  },
  error: (message: string, error?: unknown) => {
    if (error === undefined) {
      console.error(`[ERROR] ${message}`);
    } else {
      console.error(`[ERROR] ${message}`, error);
    }
  },
};
