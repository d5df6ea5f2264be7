import BinaryReader, { expectLength } from "../binary-reader";
import BinaryWriter from "../binary-writer";
import { EncodingRangeError } from "../errors";
import { Holiday } from "../types";
import { DATETIME_LENGTH, decodeDateTime, encodeDateTime } from "./datetime";
import { TEMPERATURE_UNSET, decodeTemperature, encodeTemperature } from "./temperature";

export const HOLIDAY_COUNT = 8;
export const HOLIDAY_LENGTH = DATETIME_LENGTH * 2 + 1;

export function assertHolidayIndex(index: number) {
  if (!Number.isInteger(index) || index < 1 || index > HOLIDAY_COUNT) {
    throw new EncodingRangeError(`Holiday index must be within 1-${HOLIDAY_COUNT}, got ${index}`);
  }
}

export function isHolidayCleared(holiday: Pick<Holiday, "start" | "end">) {
  return holiday.start === null && holiday.end === null;
}

/**
 * Returns a holiday that clears slot `index` when written.
 */
export function clearedHoliday(index: number): Holiday {
  assertHolidayIndex(index);
  return { index, start: null, end: null, temperature: null };
}

/**
 * Decodes `start (5) + end (5) + temperature (1)`. The temperature byte of
 * a cleared holiday is ignored.
 */
export function decodeHoliday(index: number, data: Buffer): Holiday {
  assertHolidayIndex(index);
  expectLength(data, HOLIDAY_LENGTH, "Holiday");

  const reader = new BinaryReader(data);
  const start = decodeDateTime(reader.readBytes(DATETIME_LENGTH));
  const end = decodeDateTime(reader.readBytes(DATETIME_LENGTH));
  const temperatureByte = reader.readUInt8();

  if (start === null && end === null) {
    return clearedHoliday(index);
  }

  return { index, start, end, temperature: decodeTemperature(temperatureByte) };
}

export function encodeHoliday(holiday: Holiday): Buffer {
  assertHolidayIndex(holiday.index);

  const writer = new BinaryWriter();
  writer.write(encodeDateTime(holiday.start));
  writer.write(encodeDateTime(holiday.end));

  // The device expects the sentinel on a cleared holiday, whatever was passed in.
  writer.writeUInt8(
    isHolidayCleared(holiday) ? TEMPERATURE_UNSET : encodeTemperature(holiday.temperature)
  );

  return writer.toBuffer();
}
