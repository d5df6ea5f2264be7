import { describe, expect, it } from "vitest";
import {
  dateTimeFromDate,
  dateTimeToDate,
  decodeDateTime,
  encodeDateTime,
  formatDateTime,
  parseDateTime,
} from "../../lib/codecs/datetime";
import { EncodingRangeError, MalformedDataError } from "../../lib/errors";
import { DateTime } from "../../lib/types";

const SAMPLE: DateTime = { year: 2014, month: 8, day: 27, hour: 23, minute: 56 };

describe("datetime codec", () => {
  it("packs minute, hour, day, month and year", () => {
    expect([...encodeDateTime(SAMPLE)]).toEqual([56, 23, 27, 8, 14]);
  });

  it("decodes what it encodes", () => {
    expect(decodeDateTime(Buffer.from([56, 23, 27, 8, 14]))).toEqual(SAMPLE);
    expect(decodeDateTime(encodeDateTime(SAMPLE))).toEqual(SAMPLE);
  });

  it("maps the all-0xff pattern to absent and back", () => {
    const unset = Buffer.alloc(5, 0xff);
    expect(decodeDateTime(unset)).toBeNull();
    expect(encodeDateTime(null)).toEqual(unset);
  });

  it("decodes year byte 0 as 2000", () => {
    expect(decodeDateTime(Buffer.from([0, 0, 1, 1, 0]))).toEqual({
      year: 2000,
      month: 1,
      day: 1,
      hour: 0,
      minute: 0,
    });
  });

  it("decodes year byte 0xff as 2255 when the other fields are set", () => {
    expect(decodeDateTime(Buffer.from([0, 12, 1, 1, 0xff]))?.year).toBe(2255);
  });

  it("rejects out of range fields on decode", () => {
    expect(() => decodeDateTime(Buffer.from([60, 0, 1, 1, 0]))).toThrow(MalformedDataError);
    expect(() => decodeDateTime(Buffer.from([0, 24, 1, 1, 0]))).toThrow(MalformedDataError);
    expect(() => decodeDateTime(Buffer.from([0, 0, 0, 1, 0]))).toThrow(MalformedDataError);
    expect(() => decodeDateTime(Buffer.from([0, 0, 1, 13, 0]))).toThrow(MalformedDataError);
  });

  it("rejects buffers of wrong length", () => {
    expect(() => decodeDateTime(Buffer.from([0, 0, 1, 1]))).toThrow(MalformedDataError);
  });

  it("rejects years the device can't store", () => {
    expect(() => encodeDateTime({ ...SAMPLE, year: 1999 })).toThrow(EncodingRangeError);
    expect(() => encodeDateTime({ ...SAMPLE, year: 2256 })).toThrow(EncodingRangeError);
    expect(() => encodeDateTime({ ...SAMPLE, month: 0 })).toThrow(EncodingRangeError);
  });

  it("formats and parses text form", () => {
    expect(formatDateTime(SAMPLE)).toBe("2014-08-27T23:56");
    expect(parseDateTime("2014-08-27 23:56")).toEqual(SAMPLE);
    expect(() => parseDateTime("yesterday")).toThrow(MalformedDataError);
  });

  it("converts from and to Date in local time", () => {
    expect(dateTimeFromDate(new Date(2020, 0, 2, 3, 4, 59))).toEqual({
      year: 2020,
      month: 1,
      day: 2,
      hour: 3,
      minute: 4,
    });
    expect(dateTimeToDate(SAMPLE).getTime()).toBe(new Date(2014, 7, 27, 23, 56).getTime());
  });
});
