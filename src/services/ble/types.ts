import type { AdvertisementRecord, DeviceHandle, DiscoveredDevice } from '@/types/device';

export type AdvertisementListener = (device: DeviceHandle, record: AdvertisementRecord) => void;

export interface BleConnection {
  writeCharacteristic: (characteristicUuid: string, payload: Uint8Array) => Promise<void>;
  disconnect: () => Promise<void>;
}

export interface BleTransport {
  /**
   * Starts a continuous scan; the listener runs for every advertisement seen.
   * Resolves without scanning when `signal` aborts while the adapter powers up.
   */
  startScan: (listener: AdvertisementListener, signal?: AbortSignal) => Promise<void>;
  stopScan: () => Promise<void>;
  /** Collects every advertiser seen within the window, one entry per device. Ends early on abort. */
  discoverAll: (timeoutMs: number, signal?: AbortSignal) => Promise<DiscoveredDevice[]>;
  connect: (device: DeviceHandle) => Promise<BleConnection>;
}
