import BinaryReader, { expectLength } from "../binary-reader";
import BinaryWriter from "../binary-writer";
import { EncodingRangeError } from "../errors";
import { Temperatures } from "../types";
import { TEMPERATURE_UNSET, decodeTemperature, encodeTemperature } from "./temperature";

export const TEMPERATURES_LENGTH = 7;

// Characteristic layout:
// ---------------------------
// Offset | Type | Description
// ---------------------------
// 0      | int8 | Current temperature (read only)
// 1      | int8 | Manual mode temperature
// 2      | int8 | Target temperature, low
// 3      | int8 | Target temperature, high
// 4      | int8 | Offset
// 5      | int8 | Window open detection sensitivity
// 6      | int8 | Window open duration in minutes
//
// 0x80 in any field reads as "unset" and leaves the field unchanged on write.

const INTEGER_UNSET = -128;

function decodeInteger(value: number): number | null {
  return value === INTEGER_UNSET ? null : value;
}

function encodeInteger(value: number | null, what: string) {
  if (value === null) {
    return INTEGER_UNSET;
  }
  if (!Number.isInteger(value) || value < -127 || value > 127) {
    throw new EncodingRangeError(`${what} must be between -127 and 127, got ${value}`);
  }
  return value;
}

export function decodeTemperatures(data: Buffer): Temperatures {
  expectLength(data, TEMPERATURES_LENGTH, "Temperatures");

  const reader = new BinaryReader(data);
  return {
    current: decodeTemperature(reader.readUInt8()),
    manual: decodeTemperature(reader.readUInt8()),
    targetLow: decodeTemperature(reader.readUInt8()),
    targetHigh: decodeTemperature(reader.readUInt8()),
    offset: decodeTemperature(reader.readUInt8()),
    windowOpenDetection: decodeInteger(reader.readInt8()),
    windowOpenMinutes: decodeInteger(reader.readInt8()),
  };
}

/**
 * The current temperature is always written as unset.
 */
export function encodeTemperatures(value: Partial<Temperatures>): Buffer {
  const writer = new BinaryWriter();
  writer.writeUInt8(TEMPERATURE_UNSET);
  writer.writeUInt8(encodeTemperature(value.manual ?? null));
  writer.writeUInt8(encodeTemperature(value.targetLow ?? null));
  writer.writeUInt8(encodeTemperature(value.targetHigh ?? null));
  writer.writeUInt8(encodeTemperature(value.offset ?? null));
  writer.writeInt8(encodeInteger(value.windowOpenDetection ?? null, "Window open detection"));
  writer.writeInt8(encodeInteger(value.windowOpenMinutes ?? null, "Window open minutes"));
  return writer.toBuffer();
}
