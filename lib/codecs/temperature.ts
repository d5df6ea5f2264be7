import { EncodingRangeError, MalformedDataError } from "../errors";
import Temperature from "../temperature";

/** Wire value meaning "not set" (or "do not change" when written). */
export const TEMPERATURE_UNSET = 0x80;

const MIN_HALF_DEGREES = -127;
const MAX_HALF_DEGREES = 127;

/**
 * Decodes a single temperature byte.
 * @param byte Raw byte as read from the buffer (0-255).
 * @returns `null` for the unset sentinel.
 */
export function decodeTemperature(byte: number): Temperature | null {
  if (!Number.isInteger(byte) || byte < 0 || byte > 255) {
    throw new MalformedDataError(`Temperature byte out of range: ${byte}`);
  }
  if (byte === TEMPERATURE_UNSET) {
    return null;
  }
  return Temperature.fromHalfDegrees(byte > 127 ? byte - 256 : byte);
}

/**
 * Encodes a temperature into its unsigned byte form.
 * @param value Temperature, or `null` for the unset sentinel.
 */
export function encodeTemperature(value: Temperature | null): number {
  if (value === null) {
    return TEMPERATURE_UNSET;
  }
  if (value.halfDegrees < MIN_HALF_DEGREES || value.halfDegrees > MAX_HALF_DEGREES) {
    throw new EncodingRangeError(`Temperature ${value.celsius}°C cannot be represented`);
  }
  return value.halfDegrees & 255;
}
