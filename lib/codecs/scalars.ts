import { expectLength } from "../binary-reader";
import { EncodingRangeError, MalformedDataError } from "../errors";

const BATTERY_UNKNOWN = 0xff;

function readSingleByte(data: Buffer, what: string) {
  expectLength(data, 1, what);
  return data[0];
}

function assertByte(value: number, what: string) {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new EncodingRangeError(`${what} must be within 0-255, got ${value}`);
  }
}

/**
 * Battery charge in percent, or `null` when the device does not know it.
 */
export function decodeBattery(data: Buffer): number | null {
  const value = readSingleByte(data, "Battery");
  if (value === BATTERY_UNKNOWN) {
    return null;
  }
  if (value > 100) {
    throw new MalformedDataError(`Battery charge out of range: ${value}`);
  }
  return value;
}

/**
 * Status flags are kept as an opaque bitmask.
 */
export function decodeFlags(data: Buffer): number {
  return readSingleByte(data, "Flags");
}

export function encodeFlags(value: number): Buffer {
  assertByte(value, "Flags");
  return Buffer.from([value]);
}

export function decodeLcdTimer(data: Buffer): number {
  return readSingleByte(data, "LCD timer");
}

export function encodeLcdTimer(value: number): Buffer {
  assertByte(value, "LCD timer");
  return Buffer.from([value]);
}

/**
 * Decodes an ASCII string, dropping trailing NUL and space padding.
 */
export function decodeString(data: Buffer): string {
  const invalid = data.findIndex((b) => b > 127);
  if (invalid !== -1) {
    throw new MalformedDataError(`Non-ASCII byte 0x${data[invalid].toString(16)} at ${invalid}`);
  }
  return data.toString("ascii").replace(/[\0 ]+$/, "");
}
