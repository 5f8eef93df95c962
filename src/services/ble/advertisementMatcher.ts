import type { BleProfile } from '@/config/bleProfile';
import type { AdvertisementRecord } from '@/types/device';

export const matchesDeviceProfile = (record: AdvertisementRecord, profile: BleProfile): boolean =>
  record.localName === profile.deviceName || record.serviceUuids.includes(profile.serviceUuid);
