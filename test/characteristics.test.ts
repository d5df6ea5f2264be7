import { describe, expect, it } from "vitest";
import { dayCharacteristic, holidayCharacteristic } from "../lib/characteristics";
import { clearedHoliday } from "../lib/codecs/holiday";
import { EncodingRangeError } from "../lib/errors";

describe("table characteristics", () => {
  it("derives day UUIDs from the first day", () => {
    expect(dayCharacteristic(0).uuid).toBe("47e9ee10-47e9-11e4-8939-164230d1df67");
    expect(dayCharacteristic(6).uuid).toBe("47e9ee16-47e9-11e4-8939-164230d1df67");
  });

  it("derives holiday UUIDs from the first holiday", () => {
    expect(holidayCharacteristic(1).uuid).toBe("47e9ee20-47e9-11e4-8939-164230d1df67");
    expect(holidayCharacteristic(8).uuid).toBe("47e9ee27-47e9-11e4-8939-164230d1df67");
  });

  it("rejects rows outside of the table", () => {
    expect(() => dayCharacteristic(7)).toThrow(EncodingRangeError);
    expect(() => holidayCharacteristic(0)).toThrow(EncodingRangeError);
  });

  it("refuses to write a holiday into another slot", () => {
    expect(() => holidayCharacteristic(2).encode(clearedHoliday(3))).toThrow(EncodingRangeError);
  });

  it("decodes holidays with the index of the slot", () => {
    expect(holidayCharacteristic(5).decode(Buffer.alloc(11, 0xff))).toEqual(clearedHoliday(5));
  });
});
