import { describe, expect, it } from "vitest";
import { clearedHoliday, decodeHoliday, encodeHoliday } from "../../lib/codecs/holiday";
import { EncodingRangeError, MalformedDataError } from "../../lib/errors";
import Temperature from "../../lib/temperature";
import { DateTime, Holiday } from "../../lib/types";

const START: DateTime = { year: 2014, month: 8, day: 27, hour: 23, minute: 56 };
const END: DateTime = { year: 2014, month: 8, day: 30, hour: 12, minute: 0 };
const UNSET_DATETIME = [0xff, 0xff, 0xff, 0xff, 0xff];

describe("holiday codec", () => {
  it("encodes start, end and temperature", () => {
    const holiday: Holiday = {
      index: 1,
      start: START,
      end: END,
      temperature: Temperature.fromCelsius(18.5),
    };

    const data = encodeHoliday(holiday);

    expect([...data]).toEqual([56, 23, 27, 8, 14, 0, 12, 30, 8, 14, 37]);
    expect(decodeHoliday(1, data)).toEqual(holiday);
  });

  it("forces the temperature sentinel when clearing", () => {
    const data = encodeHoliday({
      index: 2,
      start: null,
      end: null,
      temperature: Temperature.fromCelsius(20),
    });

    expect([...data]).toEqual([...UNSET_DATETIME, ...UNSET_DATETIME, 0x80]);
  });

  it("ignores the temperature byte of a cleared holiday", () => {
    const data = Buffer.from([...UNSET_DATETIME, ...UNSET_DATETIME, 0x2e]);
    expect(decodeHoliday(4, data)).toEqual(clearedHoliday(4));
  });

  it("keeps a holiday with a single date as is", () => {
    const holiday: Holiday = {
      index: 3,
      start: START,
      end: null,
      temperature: Temperature.fromCelsius(20),
    };

    const data = encodeHoliday(holiday);

    expect([...data]).toEqual([56, 23, 27, 8, 14, ...UNSET_DATETIME, 40]);
    expect(decodeHoliday(3, data)).toEqual(holiday);
  });

  it("rejects indices outside of 1-8", () => {
    expect(() => clearedHoliday(0)).toThrow(EncodingRangeError);
    expect(() => decodeHoliday(9, Buffer.alloc(11, 0xff))).toThrow(EncodingRangeError);
  });

  it("rejects buffers of wrong length", () => {
    expect(() => decodeHoliday(1, Buffer.alloc(10, 0xff))).toThrow(MalformedDataError);
  });
});
