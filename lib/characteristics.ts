import {
  BATTERY_UUID,
  DATETIME_UUID,
  DAY_BASE_UUID,
  DAY_COUNT,
  DEVICE_NAME_UUID,
  FIRMWARE_REVISION_2_UUID,
  FIRMWARE_REVISION_UUID,
  FLAGS_UUID,
  HOLIDAY_BASE_UUID,
  LCD_TIMER_UUID,
  MANUFACTURER_NAME_UUID,
  MODEL_NUMBER_UUID,
  PIN_UUID,
  SOFTWARE_REVISION_UUID,
  TEMPERATURES_UUID,
} from "./constants";
import { decodeDateTime, encodeDateTime } from "./codecs/datetime";
import { decodeDaySchedule, encodeDaySchedule } from "./codecs/day-schedule";
import { assertHolidayIndex, decodeHoliday, encodeHoliday } from "./codecs/holiday";
import { encodePin } from "./codecs/pin";
import {
  decodeBattery,
  decodeFlags,
  decodeLcdTimer,
  decodeString,
  encodeFlags,
  encodeLcdTimer,
} from "./codecs/scalars";
import { decodeTemperatures, encodeTemperatures } from "./codecs/temperatures";
import { EncodingRangeError } from "./errors";
import { DateTime, DaySchedule, Holiday, Temperatures } from "./types";
import { offsetUuid } from "./utils";

type CharacteristicInfo = {
  uuid: string;
  description: string;

  /** Whether the PIN has to be written before reading. Writes always need it. */
  requiresPin: boolean;
};

export type ReadableCharacteristic<T> = CharacteristicInfo & {
  decode(data: Buffer): T;
};

export type WritableCharacteristic<T> = CharacteristicInfo & {
  encode(value: T): Buffer;
};

export type Characteristic<TRead, TWrite = TRead> = ReadableCharacteristic<TRead> &
  WritableCharacteristic<TWrite>;

function stringCharacteristic(
  uuid: string,
  description: string,
  requiresPin = false
): ReadableCharacteristic<string> {
  return { uuid, description, requiresPin, decode: decodeString };
}

export const DEVICE_NAME = stringCharacteristic(DEVICE_NAME_UUID, "device name");
export const MODEL_NUMBER = stringCharacteristic(MODEL_NUMBER_UUID, "model number");
export const FIRMWARE_REVISION = stringCharacteristic(FIRMWARE_REVISION_UUID, "firmware revision");
export const SOFTWARE_REVISION = stringCharacteristic(SOFTWARE_REVISION_UUID, "software revision");
export const MANUFACTURER_NAME = stringCharacteristic(MANUFACTURER_NAME_UUID, "manufacturer name");
export const FIRMWARE_REVISION_2 = stringCharacteristic(
  FIRMWARE_REVISION_2_UUID,
  "firmware revision #2",
  true
);

export const DATETIME: Characteristic<DateTime | null> = {
  uuid: DATETIME_UUID,
  description: "time and date",
  requiresPin: true,
  decode: decodeDateTime,
  encode: encodeDateTime,
};

export const FLAGS: Characteristic<number> = {
  uuid: FLAGS_UUID,
  description: "status flags",
  requiresPin: true,
  decode: decodeFlags,
  encode: encodeFlags,
};

export const TEMPERATURES: Characteristic<Temperatures, Partial<Temperatures>> = {
  uuid: TEMPERATURES_UUID,
  description: "temperatures",
  requiresPin: true,
  decode: decodeTemperatures,
  encode: encodeTemperatures,
};

export const BATTERY: ReadableCharacteristic<number | null> = {
  uuid: BATTERY_UUID,
  description: "battery charge",
  requiresPin: true,
  decode: decodeBattery,
};

export const LCD_TIMER: Characteristic<number> = {
  uuid: LCD_TIMER_UUID,
  description: "LCD timer",
  requiresPin: true,
  decode: decodeLcdTimer,
  encode: encodeLcdTimer,
};

export const PIN: WritableCharacteristic<number> = {
  uuid: PIN_UUID,
  description: "PIN",
  requiresPin: false,
  encode: encodePin,
};

/**
 * Schedule of a weekday, Monday being 0.
 */
export function dayCharacteristic(day: number): Characteristic<DaySchedule> {
  if (!Number.isInteger(day) || day < 0 || day >= DAY_COUNT) {
    throw new EncodingRangeError(`Day index must be within 0-${DAY_COUNT - 1}, got ${day}`);
  }

  return {
    uuid: offsetUuid(DAY_BASE_UUID, day),
    description: `day #${day}`,
    requiresPin: true,
    decode: decodeDaySchedule,
    encode: encodeDaySchedule,
  };
}

/**
 * Holiday slot, indexed from 1.
 */
export function holidayCharacteristic(index: number): Characteristic<Holiday> {
  assertHolidayIndex(index);

  return {
    uuid: offsetUuid(HOLIDAY_BASE_UUID, index - 1),
    description: `holiday #${index}`,
    requiresPin: true,
    decode: (data) => decodeHoliday(index, data),
    encode: (holiday) => {
      if (holiday.index !== index) {
        throw new EncodingRangeError(`Holiday #${holiday.index} cannot be written to slot #${index}`);
      }
      return encodeHoliday(holiday);
    },
  };
}
