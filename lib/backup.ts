import { z } from "zod";
import {
  LCD_TIMER,
  TEMPERATURES,
  WritableCharacteristic,
  dayCharacteristic,
  holidayCharacteristic,
} from "./characteristics";
import { formatDateTime, parseDateTime } from "./codecs/datetime";
import { formatTimeOfDay, parseTimeOfDay } from "./codecs/day-schedule";
import { HOLIDAY_COUNT, assertHolidayIndex } from "./codecs/holiday";
import { MalformedDataError } from "./errors";
import Temperature from "./temperature";
import { DateTime, DaySchedule, DeviceSnapshot, Holiday, Temperatures } from "./types";
import { WEEKDAYS, Weekday } from "./weekdays";

const TIME_OF_DAY = z.string().regex(/^\d{1,2}:\d{2}$/);
const DATE_TIME = z.string().regex(/^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}$/);

const PeriodSchema = z.object({ start: TIME_OF_DAY, end: TIME_OF_DAY });

const DaySchema = z.array(PeriodSchema);

const HolidaySchema = z.object({
  start: DATE_TIME.nullable(),
  end: DATE_TIME.nullable(),
  temperature: z.number().nullable(),
});

const TemperaturesSchema = z.object({
  manual: z.number().nullable().optional(),
  target_low: z.number().nullable().optional(),
  target_high: z.number().nullable().optional(),
  offset: z.number().nullable().optional(),
  window_open_detection: z.number().int().nullable().optional(),
  window_open_minutes: z.number().int().nullable().optional(),
});

const LcdTimerSchema = z.number().int();

export type BackupPeriod = z.infer<typeof PeriodSchema>;
export type BackupHoliday = z.infer<typeof HolidaySchema>;
export type BackupTemperatures = z.infer<typeof TemperaturesSchema>;

export type DayKey = `day.${Weekday}`;
export type HolidayKey = `holiday.${number}`;

/**
 * Flat, JSON-ready form of a `DeviceSnapshot`.
 */
export type BackupData = {
  temperatures?: BackupTemperatures;
  lcd_timer?: number;
} & { [key in DayKey]?: Array<BackupPeriod> } & { [key in HolidayKey]?: BackupHoliday };

/**
 * A single characteristic write produced by `planRestore`.
 */
export type CharacteristicWrite = {
  uuid: string;
  description: string;
  payload: Buffer;
};

export function dayKey(day: number): DayKey {
  return `day.${WEEKDAYS[day]}`;
}

export function holidayKey(index: number): HolidayKey {
  return `holiday.${index}`;
}

const celsiusOrNull = (value: Temperature | null | undefined) => (value ? value.celsius : null);
const temperatureOrNull = (value: number | null | undefined) =>
  value === null || value === undefined ? null : Temperature.fromCelsius(value);
const dateTimeOrNull = (value: DateTime | null) => (value ? formatDateTime(value) : null);
const parseDateTimeOrNull = (value: string | null) => (value ? parseDateTime(value) : null);

function backupTemperatures(value: Partial<Temperatures>): BackupTemperatures {
  // The current temperature is read only, there's no point in saving it.
  return {
    manual: celsiusOrNull(value.manual),
    target_low: celsiusOrNull(value.targetLow),
    target_high: celsiusOrNull(value.targetHigh),
    offset: celsiusOrNull(value.offset),
    window_open_detection: value.windowOpenDetection ?? null,
    window_open_minutes: value.windowOpenMinutes ?? null,
  };
}

function backupDay(periods: DaySchedule): Array<BackupPeriod> {
  return periods.map((period) => ({
    start: formatTimeOfDay(period.start),
    end: formatTimeOfDay(period.end),
  }));
}

function backupHoliday(holiday: Holiday): BackupHoliday {
  return {
    start: dateTimeOrNull(holiday.start),
    end: dateTimeOrNull(holiday.end),
    temperature: celsiusOrNull(holiday.temperature),
  };
}

/**
 * Flattens a snapshot into stable keys. Entries missing from the snapshot
 * are missing from the result.
 */
export function createBackup(snapshot: DeviceSnapshot): BackupData {
  const data: BackupData = {};

  if (snapshot.temperatures) {
    data.temperatures = backupTemperatures(snapshot.temperatures);
  }

  if (snapshot.lcdTimer !== undefined) {
    data.lcd_timer = snapshot.lcdTimer;
  }

  snapshot.days?.forEach((periods, day) => {
    if (periods && day < WEEKDAYS.length) {
      data[dayKey(day)] = backupDay(periods);
    }
  });

  for (const holiday of snapshot.holidays ?? []) {
    if (holiday) {
      assertHolidayIndex(holiday.index);
      data[holidayKey(holiday.index)] = backupHoliday(holiday);
    }
  }

  return data;
}

function parseEntry<T extends z.ZodTypeAny>(schema: T, key: string, value: unknown): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new MalformedDataError(`Invalid backup entry "${key}": ${result.error.message}`);
  }
  return result.data;
}

/**
 * Validates a parsed JSON document. Unknown keys are dropped.
 */
export function parseBackup(json: unknown): BackupData {
  if (typeof json !== "object" || json === null || Array.isArray(json)) {
    throw new MalformedDataError("Backup must be a JSON object");
  }

  const input = new Map(Object.entries(json));
  const data: BackupData = {};

  if (input.has("temperatures")) {
    data.temperatures = parseEntry(TemperaturesSchema, "temperatures", input.get("temperatures"));
  }

  if (input.has("lcd_timer")) {
    data.lcd_timer = parseEntry(LcdTimerSchema, "lcd_timer", input.get("lcd_timer"));
  }

  for (let day = 0; day < WEEKDAYS.length; day++) {
    const key = dayKey(day);
    if (input.has(key)) {
      data[key] = parseEntry(DaySchema, key, input.get(key));
    }
  }

  for (let index = 1; index <= HOLIDAY_COUNT; index++) {
    const key = holidayKey(index);
    if (input.has(key)) {
      data[key] = parseEntry(HolidaySchema, key, input.get(key));
    }
  }

  return data;
}

/**
 * Converts backup data back into domain values.
 */
export function snapshotFromBackup(data: BackupData): DeviceSnapshot {
  const snapshot: DeviceSnapshot = {};

  if (data.temperatures) {
    const t = data.temperatures;
    snapshot.temperatures = {
      manual: temperatureOrNull(t.manual),
      targetLow: temperatureOrNull(t.target_low),
      targetHigh: temperatureOrNull(t.target_high),
      offset: temperatureOrNull(t.offset),
      windowOpenDetection: t.window_open_detection ?? null,
      windowOpenMinutes: t.window_open_minutes ?? null,
    };
  }

  if (data.lcd_timer !== undefined) {
    snapshot.lcdTimer = data.lcd_timer;
  }

  const days: Array<DaySchedule | undefined> = WEEKDAYS.map((_, day) =>
    data[dayKey(day)]?.map((period) => ({
      start: parseTimeOfDay(period.start),
      end: parseTimeOfDay(period.end),
    }))
  );
  if (days.some((day) => day !== undefined)) {
    snapshot.days = days;
  }

  const holidays: Array<Holiday | undefined> = [];
  for (let index = 1; index <= HOLIDAY_COUNT; index++) {
    const holiday = data[holidayKey(index)];
    holidays.push(
      holiday && {
        index,
        start: parseDateTimeOrNull(holiday.start),
        end: parseDateTimeOrNull(holiday.end),
        temperature: temperatureOrNull(holiday.temperature),
      }
    );
  }
  if (holidays.some((holiday) => holiday !== undefined)) {
    snapshot.holidays = holidays;
  }

  return snapshot;
}

function plan<T>(characteristic: WritableCharacteristic<T>, value: T): CharacteristicWrite {
  return {
    uuid: characteristic.uuid,
    description: characteristic.description,
    payload: characteristic.encode(value),
  };
}

/**
 * Encodes every value present in the snapshot. Either all values encode,
 * or an error is thrown and nothing is returned.
 */
export function planRestore(snapshot: DeviceSnapshot): Array<CharacteristicWrite> {
  const writes: Array<CharacteristicWrite> = [];

  if (snapshot.temperatures) {
    writes.push(plan(TEMPERATURES, snapshot.temperatures));
  }

  if (snapshot.lcdTimer !== undefined) {
    writes.push(plan(LCD_TIMER, snapshot.lcdTimer));
  }

  snapshot.days?.forEach((periods, day) => {
    if (periods) {
      writes.push(plan(dayCharacteristic(day), periods));
    }
  });

  for (const holiday of snapshot.holidays ?? []) {
    if (holiday) {
      writes.push(plan(holidayCharacteristic(holiday.index), holiday));
    }
  }

  return writes;
}
