export interface AdvertisementRecord {
  localName: string | null;
  /** Canonical lowercase, dashed UUIDs. */
  serviceUuids: string[];
  address: string;
}

export interface DeviceHandle {
  /** Transport-specific identity, used to look the peripheral back up on connect. */
  id: string;
  address: string;
  name: string | null;
}

export interface DiscoveredDevice {
  device: DeviceHandle;
  record: AdvertisementRecord;
}

export interface ActuationCommand {
  readonly value: number;
  readonly channel: number | null;
}
