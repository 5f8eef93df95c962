const COMPACT_UUID = /^[0-9a-f]{32}$/;

/**
 * Brings a UUID into the lowercase dashed 128-bit form used throughout the
 * client. Noble reports UUIDs without dashes; 16-bit short UUIDs pass through.
 */
export const normalizeUuid = (uuid: string): string => {
  const lowered = uuid.trim().toLowerCase();
  if (!COMPACT_UUID.test(lowered)) {
    return lowered;
  }
  return [
    lowered.slice(0, 8),
    lowered.slice(8, 12),
    lowered.slice(12, 16),
    lowered.slice(16, 20),
    lowered.slice(20),
  ].join('-');
};

export const toCompactUuid = (uuid: string): string => uuid.trim().toLowerCase().replace(/-/g, '');
