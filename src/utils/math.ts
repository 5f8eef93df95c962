export const clamp = (value: number, min: number, max: number): number => Math.max(min, Math.min(max, value));

/** Share of the usage window still available, as an actuation value. */
export const remainingFraction = (utilizationPercent: number) => clamp(1 - utilizationPercent / 100, 0, 1);
