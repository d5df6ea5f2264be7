export const WEEKDAYS = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

/**
 * Resolves `"monday"`, `"mon"` or `"1"` into a day index (Monday = 0).
 * @returns `undefined` if the name matches no day.
 */
export function parseWeekday(value: string): number | undefined {
  const name = value.trim().toLowerCase();

  if (/^[1-7]$/.test(name)) {
    return Number(name) - 1;
  }

  if (name.length < 2) {
    return undefined;
  }

  const index = WEEKDAYS.findIndex((day) => day.startsWith(name));
  return index === -1 ? undefined : index;
}
