import type { BleProfile } from '@/config/bleProfile';
import type { AdvertisementRecord, DeviceHandle, DiscoveredDevice } from '@/types/device';
import { delay } from '@/utils/abort';
import { logger } from '@/utils/logger';

import type { AdvertisementListener, BleConnection, BleTransport } from './types';

export interface MockAdvertiser {
  device: DeviceHandle;
  record: AdvertisementRecord;
  /** Time after scan start at which the advertisement is first seen. */
  delayMs: number;
}

export interface MockWrite {
  deviceId: string;
  characteristicUuid: string;
  payload: Uint8Array;
}

export interface MockTransportOptions {
  /** Time the simulated adapter takes to power up before a scan starts. */
  startDelayMs?: number;
  failScan?: boolean;
  writeDelayMs?: number;
  failConnect?: boolean;
  onWrite?: (write: MockWrite) => void;
}

export interface MockBleTransport extends BleTransport {
  readonly writes: MockWrite[];
  isScanning: () => boolean;
  stopScanCount: () => number;
  openConnections: () => number;
}

export const createMockAdvertiser = (
  address: string,
  localName: string | null,
  serviceUuids: string[] = [],
  delayMs = 0,
): MockAdvertiser => ({
  device: { id: address.toLowerCase(), address, name: localName },
  record: { localName, serviceUuids, address },
  delayMs,
});

/** A simulated neighbourhood: two unrelated advertisers and the controller. */
export const createDemoAdvertisers = (profile: BleProfile): MockAdvertiser[] => [
  createMockAdvertiser('4C:11:AE:90:12:01', 'Living Room TV', ['0000180f-0000-1000-8000-00805f9b34fb'], 120),
  createMockAdvertiser('7A:3D:52:0E:88:14', null, [], 300),
  createMockAdvertiser('D4:F9:8D:01:6B:2A', profile.deviceName, [profile.serviceUuid], 850),
];

export const createMockBleTransport = (
  advertisers: MockAdvertiser[],
  options: MockTransportOptions = {},
): MockBleTransport => {
  const writes: MockWrite[] = [];
  let scanTimers: ReturnType<typeof setTimeout>[] = [];
  let scanning = false;
  let stopScans = 0;
  let connections = 0;

  const clearScanTimers = () => {
    scanTimers.forEach((timer) => clearTimeout(timer));
    scanTimers = [];
  };

  const startScan = async (listener: AdvertisementListener, signal?: AbortSignal) => {
    if (options.startDelayMs && !(await delay(options.startDelayMs, signal))) {
      return;
    }
    if (signal?.aborted) {
      return;
    }
    if (options.failScan) {
      throw new Error('Mock adapter refused to scan');
    }
    clearScanTimers();
    scanning = true;
    scanTimers = advertisers.map(({ device, record, delayMs }) =>
      setTimeout(() => {
        if (scanning) {
          listener(device, record);
        }
      }, delayMs),
    );
  };

  const stopScan = async () => {
    stopScans += 1;
    scanning = false;
    clearScanTimers();
  };

  const discoverAll = async (timeoutMs: number, signal?: AbortSignal): Promise<DiscoveredDevice[]> => {
    const startedAt = Date.now();
    await delay(timeoutMs, signal);
    const elapsed = Date.now() - startedAt;
    return advertisers
      .filter((advertiser) => advertiser.delayMs <= elapsed)
      .sort((a, b) => a.delayMs - b.delayMs)
      .map(({ device, record }) => ({ device, record }));
  };

  const connect = async (device: DeviceHandle): Promise<BleConnection> => {
    if (options.failConnect) {
      throw new Error(`Mock connection to ${device.address} refused`);
    }

    connections += 1;
    let open = true;
    logger.ble(`mock connected to ${device.address}`);

    return {
      writeCharacteristic: async (characteristicUuid, payload) => {
        if (!open) {
          throw new Error('Mock connection is closed');
        }
        if (options.writeDelayMs) {
          await delay(options.writeDelayMs);
        }
        const write = { deviceId: device.id, characteristicUuid, payload: Uint8Array.from(payload) };
        writes.push(write);
        logger.ble(`mock write ${Buffer.from(payload).toString('hex')}`);
        options.onWrite?.(write);
      },
      disconnect: async () => {
        if (open) {
          open = false;
          connections -= 1;
        }
      },
    };
  };

  return {
    writes,
    isScanning: () => scanning,
    stopScanCount: () => stopScans,
    openConnections: () => connections,
    startScan,
    stopScan,
    discoverAll,
    connect,
  };
};
