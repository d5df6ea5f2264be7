import BinaryReader, { expectLength } from "../binary-reader";
import BinaryWriter from "../binary-writer";
import { EncodingRangeError, MalformedDataError, TooManyPeriodsError } from "../errors";
import { DaySchedule, Period } from "../types";

export const PERIODS_PER_DAY = 4;
export const PERIOD_LENGTH = 4;
export const DAY_SCHEDULE_LENGTH = PERIODS_PER_DAY * PERIOD_LENGTH;

const UNSET_BYTE = 0xff;
const MINUTES_PER_DAY = 24 * 60;

function decodeTimeOfDay(hour: number, minute: number) {
  if (hour > 23 || minute > 59) {
    throw new MalformedDataError(`Invalid time of day in schedule: ${hour}:${minute}`);
  }
  return hour * 60 + minute;
}

function writeTimeOfDay(writer: BinaryWriter, minutes: number) {
  if (!Number.isInteger(minutes) || minutes < 0 || minutes >= MINUTES_PER_DAY) {
    throw new EncodingRangeError(`Time of day must be within 0-1439 minutes, got ${minutes}`);
  }
  writer.writeUInt8(Math.floor(minutes / 60));
  writer.writeUInt8(minutes % 60);
}

// Slot layout:
// ---------------------------
// Offset | Type  | Description
// ---------------------------
// 0      | uint8 | Start hour
// 1      | uint8 | Start minute
// 2      | uint8 | End hour
// 3      | uint8 | End minute
//
// Unused slots are filled with 0xff.

/**
 * Decodes the periods of a single day. Unused slots are skipped, everything
 * else is returned in slot order without further checks.
 */
export function decodeDaySchedule(data: Buffer): DaySchedule {
  expectLength(data, DAY_SCHEDULE_LENGTH, "Day schedule");

  const reader = new BinaryReader(data);
  const periods: Array<Period> = [];

  for (let slot = 0; slot < PERIODS_PER_DAY; slot++) {
    const bytes = reader.readBytes(PERIOD_LENGTH);
    if (bytes.every((b) => b === UNSET_BYTE)) {
      continue;
    }

    periods.push({
      start: decodeTimeOfDay(bytes[0], bytes[1]),
      end: decodeTimeOfDay(bytes[2], bytes[3]),
    });
  }

  return periods;
}

export function encodeDaySchedule(periods: DaySchedule): Buffer {
  if (periods.length > PERIODS_PER_DAY) {
    throw new TooManyPeriodsError(periods.length);
  }

  const writer = new BinaryWriter();
  for (const period of periods) {
    writeTimeOfDay(writer, period.start);
    writeTimeOfDay(writer, period.end);
  }

  for (let slot = periods.length; slot < PERIODS_PER_DAY; slot++) {
    writer.write(Buffer.alloc(PERIOD_LENGTH, UNSET_BYTE));
  }

  return writer.toBuffer();
}

/**
 * Formats minutes since midnight as `HH:MM`.
 */
export function formatTimeOfDay(minutes: number) {
  const hh = String(Math.floor(minutes / 60)).padStart(2, "0");
  const mm = String(minutes % 60).padStart(2, "0");
  return `${hh}:${mm}`;
}

/**
 * Parses `HH:MM` into minutes since midnight.
 */
export function parseTimeOfDay(value: string) {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  const hour = Number(match?.[1]);
  const minute = Number(match?.[2]);
  if (!match || hour > 23 || minute > 59) {
    throw new MalformedDataError(`Invalid time of day: "${value}"`);
  }
  return hour * 60 + minute;
}
