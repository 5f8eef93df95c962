import { type BleProfile, bleProfile } from '@/config/bleProfile';
import type { DeviceHandle, DiscoveredDevice } from '@/types/device';
import { logger } from '@/utils/logger';

import { matchesDeviceProfile } from './advertisementMatcher';
import type { BleTransport } from './types';

export interface DiscoveryOptions {
  timeoutMs: number;
  debug?: boolean;
  profile?: BleProfile;
  print?: (line: string) => void;
  signal?: AbortSignal;
}

const RULE = '='.repeat(60);

const printDiscoveryReport = (discovered: DiscoveredDevice[], print: (line: string) => void) => {
  const ordered = [...discovered].sort((a, b) => a.device.address.localeCompare(b.device.address));
  const withServices = ordered.filter(({ record }) => record.serviceUuids.length > 0);

  print('');
  print(RULE);
  print(`Found ${discovered.length} BLE device(s):`);
  print(RULE);
  withServices.forEach(({ device, record }) => {
    const name = record.localName || '(no name)';
    print(`  ${name.padEnd(30)}  ${device.address}`);
    print(`    advertised services: ${record.serviceUuids.join(', ')}`);
  });
  print(`  (${discovered.length - withServices.length} other device(s) with no advertised services)`);
  print(RULE);
  print('');
};

const scanForFirstMatch = async (
  transport: BleTransport,
  profile: BleProfile,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<DeviceHandle | null> => {
  let found: DeviceHandle | null = null;
  // Aborted on match, timeout, caller abort or a failed start; also cancels an adapter power-up wait.
  const scan = new AbortController();
  const settle = () => scan.abort();
  const settled = new Promise<void>((resolve) => {
    scan.signal.addEventListener('abort', () => resolve(), { once: true });
  });

  const timer = setTimeout(settle, timeoutMs);
  signal?.addEventListener('abort', settle, { once: true });
  if (signal?.aborted) {
    settle();
  }

  let startError: unknown = null;
  const started = transport
    .startScan((device, record) => {
      if (found || !matchesDeviceProfile(record, profile)) {
        return;
      }
      found = device;
      settle();
    }, scan.signal)
    .catch((error: unknown) => {
      if (scan.signal.aborted) {
        logger.warn('Scan failed to start after the scan window closed', error);
        return;
      }
      startError = error;
      settle();
    });

  try {
    await settled;
    await started;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', settle);
    await transport.stopScan();
  }

  if (startError) {
    throw startError;
  }
  return found;
};

/**
 * Looks for the controller for at most `timeoutMs`. The fast path returns on
 * the first matching advertisement; debug mode observes the whole window and
 * prints every advertiser before matching.
 */
export const discoverDevice = async (
  transport: BleTransport,
  { timeoutMs, debug = false, profile = bleProfile, print = console.log, signal }: DiscoveryOptions,
): Promise<DeviceHandle | null> => {
  print(`Scanning for ${profile.deviceName}...`);

  if (!debug) {
    const device = await scanForFirstMatch(transport, profile, timeoutMs, signal);
    logger.ble(device ? `matched ${device.address}` : `no match within ${timeoutMs}ms`);
    return device;
  }

  const discovered = await transport.discoverAll(timeoutMs, signal);
  if (signal?.aborted) {
    return null;
  }
  printDiscoveryReport(discovered, print);
  return discovered.find(({ record }) => matchesDeviceProfile(record, profile))?.device ?? null;
};
