import BinaryReader, { expectLength } from "../binary-reader";
import BinaryWriter from "../binary-writer";
import { EncodingRangeError, MalformedDataError } from "../errors";
import { DateTime } from "../types";

export const DATETIME_LENGTH = 5;

const UNSET_BYTE = 0xff;
const BASE_YEAR = 2000;

type FieldRange = [field: keyof DateTime, min: number, max: number];

const FIELD_RANGES: Array<FieldRange> = [
  ["minute", 0, 59],
  ["hour", 0, 23],
  ["day", 1, 31],
  ["month", 1, 12],
  ["year", BASE_YEAR, BASE_YEAR + 255],
];

function findInvalidField(value: DateTime) {
  return FIELD_RANGES.find(
    ([field, min, max]) => !Number.isInteger(value[field]) || value[field] < min || value[field] > max
  );
}

/**
 * Decodes `minute, hour, day, month, year - 2000`.
 * @returns `null` when every byte holds the unset marker.
 */
export function decodeDateTime(data: Buffer): DateTime | null {
  expectLength(data, DATETIME_LENGTH, "Date and time");

  // Must be checked before the fields, 0xff is a valid year byte on its own.
  if (data.every((b) => b === UNSET_BYTE)) {
    return null;
  }

  const reader = new BinaryReader(data);
  const value: DateTime = {
    minute: reader.readUInt8(),
    hour: reader.readUInt8(),
    day: reader.readUInt8(),
    month: reader.readUInt8(),
    year: reader.readUInt8() + BASE_YEAR,
  };

  const invalid = findInvalidField(value);
  if (invalid) {
    throw new MalformedDataError(`Date and time has invalid ${invalid[0]}: ${value[invalid[0]]}`);
  }

  return value;
}

export function encodeDateTime(value: DateTime | null): Buffer {
  if (value === null) {
    return Buffer.alloc(DATETIME_LENGTH, UNSET_BYTE);
  }

  const invalid = findInvalidField(value);
  if (invalid) {
    const [field, min, max] = invalid;
    throw new EncodingRangeError(`${field} must be within ${min}-${max}, got ${value[field]}`);
  }

  const writer = new BinaryWriter();
  writer.writeUInt8(value.minute);
  writer.writeUInt8(value.hour);
  writer.writeUInt8(value.day);
  writer.writeUInt8(value.month);
  writer.writeUInt8(value.year - BASE_YEAR);
  return writer.toBuffer();
}

/**
 * Converts a `Date` into device time, in the host's time zone. Seconds are dropped.
 */
export function dateTimeFromDate(date: Date): DateTime {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
    hour: date.getHours(),
    minute: date.getMinutes(),
  };
}

export function dateTimeToDate(value: DateTime): Date {
  return new Date(value.year, value.month - 1, value.day, value.hour, value.minute);
}

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

/**
 * Formats as `YYYY-MM-DDTHH:MM`.
 */
export function formatDateTime(value: DateTime) {
  return (
    `${pad(value.year, 4)}-${pad(value.month)}-${pad(value.day)}` +
    `T${pad(value.hour)}:${pad(value.minute)}`
  );
}

/**
 * Parses `YYYY-MM-DDTHH:MM` (or with a space instead of `T`). Field ranges
 * are checked when the value is encoded.
 */
export function parseDateTime(value: string): DateTime {
  const match = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})$/.exec(value.trim());
  if (!match) {
    throw new MalformedDataError(`Invalid date and time: "${value}"`);
  }
  return {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: Number(match[4]),
    minute: Number(match[5]),
  };
}
