export interface BleProfile {
  deviceName: string;
  serviceUuid: string;
  characteristicUuid: string;
  /** Highest output channel the controller firmware drives. */
  maxChannel: number;
}

export const bleProfile: Readonly<BleProfile> = Object.freeze({
  deviceName: 'GalvoCtrl',
  serviceUuid: 'e0f3a8b1-4c6d-4e9f-8b2a-7d1c5f3e9a0b',
  characteristicUuid: 'a1b2c3d4-5e6f-7890-abcd-ef1234567890',
  maxChannel: 5,
});
