import noble, { type Characteristic, type Peripheral } from '@abandonware/noble';

import type { BleProfile } from '@/config/bleProfile';
import type { AdvertisementRecord, DeviceHandle, DiscoveredDevice } from '@/types/device';
import { delay } from '@/utils/abort';
import { logger } from '@/utils/logger';

import type { AdvertisementListener, BleConnection, BleTransport } from './types';
import { normalizeUuid, toCompactUuid } from './uuid';

const POWER_ON_TIMEOUT_MS = 5000;

/** Resolves `false` when `signal` aborts before the adapter reports `poweredOn`. */
const waitForPoweredOn = async (signal?: AbortSignal) => {
  if (noble.state === 'poweredOn') {
    return true;
  }

  return new Promise<boolean>((resolve, reject) => {
    const cleanup = () => {
      clearTimeout(timeout);
      noble.removeListener('stateChange', onStateChange);
      signal?.removeEventListener('abort', onAbort);
    };
    const onStateChange = (state: string) => {
      if (state !== 'poweredOn') {
        return;
      }
      cleanup();
      resolve(true);
    };
    const onAbort = () => {
      cleanup();
      resolve(false);
    };
    const timeout = setTimeout(() => {
      cleanup();
      reject(new Error(`Bluetooth adapter is not powered on (state: ${noble.state})`));
    }, POWER_ON_TIMEOUT_MS);

    if (signal?.aborted) {
      onAbort();
      return;
    }
    noble.on('stateChange', onStateChange);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

// macOS hides hardware addresses; CoreBluetooth hands out a per-host UUID instead.
const peripheralAddress = (peripheral: Peripheral) =>
  peripheral.address && peripheral.address !== 'unknown' ? peripheral.address : peripheral.id;

const toHandle = (peripheral: Peripheral): DeviceHandle => ({
  id: peripheral.id,
  address: peripheralAddress(peripheral),
  name: peripheral.advertisement?.localName || null,
});

const toRecord = (peripheral: Peripheral): AdvertisementRecord => ({
  localName: peripheral.advertisement?.localName || null,
  serviceUuids: (peripheral.advertisement?.serviceUuids ?? []).map(normalizeUuid),
  address: peripheralAddress(peripheral),
});

const findCharacteristic = (characteristics: Characteristic[], uuid: string) =>
  characteristics.find((characteristic) => normalizeUuid(characteristic.uuid) === uuid);

export const createNobleTransport = (profile: BleProfile): BleTransport => {
  const peripherals = new Map<string, Peripheral>();
  let discoverListener: ((peripheral: Peripheral) => void) | null = null;

  const removeDiscoverListener = () => {
    if (discoverListener) {
      noble.removeListener('discover', discoverListener);
      discoverListener = null;
    }
  };

  const startScan = async (listener: AdvertisementListener, signal?: AbortSignal) => {
    if (!(await waitForPoweredOn(signal))) {
      return;
    }

    removeDiscoverListener();
    const onDiscover = (peripheral: Peripheral) => {
      peripherals.set(peripheral.id, peripheral);
      listener(toHandle(peripheral), toRecord(peripheral));
    };
    discoverListener = onDiscover;
    noble.on('discover', onDiscover);

    try {
      // Duplicates on: the scan response carrying the local name can arrive after the first report.
      await noble.startScanningAsync([], true);
    } catch (error) {
      removeDiscoverListener();
      throw error;
    }
    logger.ble('scan started');
  };

  const stopScan = async () => {
    await noble.stopScanningAsync();
    removeDiscoverListener();
    logger.ble('scan stopped');
  };

  const discoverAll = async (timeoutMs: number, signal?: AbortSignal): Promise<DiscoveredDevice[]> => {
    const seen = new Map<string, DiscoveredDevice>();

    await startScan((device, record) => {
      const previous = seen.get(device.id)?.record;
      const merged: AdvertisementRecord = previous
        ? {
            localName: record.localName ?? previous.localName,
            serviceUuids: Array.from(new Set([...previous.serviceUuids, ...record.serviceUuids])),
            address: record.address,
          }
        : record;
      seen.set(device.id, { device: { ...device, name: merged.localName }, record: merged });
    }, signal);

    try {
      await delay(timeoutMs, signal);
    } finally {
      await stopScan();
    }

    return Array.from(seen.values());
  };

  const connect = async (device: DeviceHandle): Promise<BleConnection> => {
    const peripheral = peripherals.get(device.id);
    if (!peripheral) {
      throw new Error(`Unknown peripheral ${device.address}; scan before connecting`);
    }

    await peripheral.connectAsync();
    logger.ble(`connected to ${device.address}`);

    try {
      const { characteristics } = await peripheral.discoverSomeServicesAndCharacteristicsAsync(
        [toCompactUuid(profile.serviceUuid)],
        [toCompactUuid(profile.characteristicUuid)],
      );

      return {
        writeCharacteristic: async (characteristicUuid, payload) => {
          const characteristic = findCharacteristic(characteristics, characteristicUuid);
          if (!characteristic) {
            throw new Error(`Characteristic ${characteristicUuid} not found on ${device.address}`);
          }
          const withoutResponse = !characteristic.properties.includes('write');
          await characteristic.writeAsync(Buffer.from(payload), withoutResponse);
        },
        disconnect: async () => {
          await peripheral.disconnectAsync();
          logger.ble(`disconnected from ${device.address}`);
        },
      };
    } catch (error) {
      await peripheral.disconnectAsync();
      throw error;
    }
  };

  return {
    startScan,
    stopScan,
    discoverAll,
    connect,
  };
};
