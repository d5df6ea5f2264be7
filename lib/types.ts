import Temperature from "./temperature";

/**
 * Date and time as stored by the device. Minute resolution, no time zone.
 */
export type DateTime = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
};

/**
 * Heating period of a day, in minutes since midnight.
 * The device does not require `start < end`.
 */
export type Period = {
  start: number;
  end: number;
};

/**
 * Up to 4 periods of a single weekday, in slot order.
 */
export type DaySchedule = ReadonlyArray<Period>;

export type Holiday = {
  /** Holiday slot, 1-8. */
  index: number;
  start: DateTime | null;
  end: DateTime | null;
  temperature: Temperature | null;
};

export type Temperatures = {
  current: Temperature | null;
  manual: Temperature | null;
  targetLow: Temperature | null;
  targetHigh: Temperature | null;
  offset: Temperature | null;
  /** Window-open detection sensitivity. */
  windowOpenDetection: number | null;
  windowOpenMinutes: number | null;
};

/**
 * Every restorable setting of a device. Missing entries are left untouched
 * on restore.
 */
export type DeviceSnapshot = {
  /** The current temperature is read only and may be left out. */
  temperatures?: Partial<Temperatures>;
  lcdTimer?: number;
  /** Indexed from Monday (0) to Sunday (6). */
  days?: ReadonlyArray<DaySchedule | undefined>;
  /** Indexed by holiday index minus one. */
  holidays?: ReadonlyArray<Holiday | undefined>;
};
