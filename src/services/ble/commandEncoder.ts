import { bleProfile } from '@/config/bleProfile';
import type { ActuationCommand } from '@/types/device';

const FLOAT_BYTES = 4;

export class InvalidCommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCommandError';
  }
}

export class CommandParseError extends Error {
  constructor(readonly input: string) {
    super(`Invalid input: ${input}`);
    this.name = 'CommandParseError';
  }
}

/**
 * Wire layout: little-endian float32, optionally followed by the channel as
 * an unsigned byte. Without the byte the controller drives channel 0.
 */
export const encodeCommand = (value: number, channel: number | null): Uint8Array => {
  const bytes = new Uint8Array(channel === null ? FLOAT_BYTES : FLOAT_BYTES + 1);
  const view = new DataView(bytes.buffer);
  view.setFloat32(0, value, true);
  if (channel !== null) {
    view.setUint8(FLOAT_BYTES, channel);
  }
  return bytes;
};

export const createActuationCommand = (
  value: number,
  channel: number | null,
  maxChannel = bleProfile.maxChannel,
): ActuationCommand => {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidCommandError('Value must be between 0.0 and 1.0');
  }
  if (channel !== null && (!Number.isInteger(channel) || channel < 0 || channel > maxChannel)) {
    throw new InvalidCommandError(`Channel must be an integer between 0 and ${maxChannel}`);
  }
  return Object.freeze({ value, channel });
};

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER = /^[+-]?\d+$/;

/** Parses `value` or `channel:value`; a bare value takes `defaultChannel`. */
export const parseCommandToken = (token: string, defaultChannel: number | null): ActuationCommand => {
  const trimmed = token.trim();
  const separator = trimmed.indexOf(':');
  const channelText = separator === -1 ? null : trimmed.slice(0, separator).trim();
  const valueText = separator === -1 ? trimmed : trimmed.slice(separator + 1).trim();

  if (!DECIMAL.test(valueText) || (channelText !== null && !INTEGER.test(channelText))) {
    throw new CommandParseError(token);
  }

  const channel = channelText === null ? defaultChannel : Number.parseInt(channelText, 10);
  return createActuationCommand(Number(valueText), channel);
};
