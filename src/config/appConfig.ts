const parseBoolean = (value: string | undefined, fallback: boolean) => {
  if (value === undefined) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }

  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return fallback;
};

const parseNumber = (value: string | undefined, fallback: number) => {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const appConfig = {
  useMockBleTransport: parseBoolean(process.env.GALVO_USE_MOCK_BLE, false),
  scanTimeoutMs: parseNumber(process.env.GALVO_SCAN_TIMEOUT_MS, 10_000),
  httpTimeoutMs: parseNumber(process.env.GALVO_HTTP_TIMEOUT_MS, 10_000),
  verboseLogging: parseBoolean(process.env.GALVO_VERBOSE, false),
};
