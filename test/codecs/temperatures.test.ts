import { describe, expect, it } from "vitest";
import { decodeTemperatures, encodeTemperatures } from "../../lib/codecs/temperatures";
import { EncodingRangeError, MalformedDataError } from "../../lib/errors";
import Temperature from "../../lib/temperature";

describe("temperatures codec", () => {
  it("decodes every field", () => {
    const value = decodeTemperatures(Buffer.from([0x2a, 0x28, 0x20, 0x2a, 0xff, 0x04, 0x0a]));

    expect(value).toEqual({
      current: Temperature.fromCelsius(21),
      manual: Temperature.fromCelsius(20),
      targetLow: Temperature.fromCelsius(16),
      targetHigh: Temperature.fromCelsius(21),
      offset: Temperature.fromCelsius(-0.5),
      windowOpenDetection: 4,
      windowOpenMinutes: 10,
    });
  });

  it("round-trips absent through every field", () => {
    const unset = Buffer.alloc(7, 0x80);
    const value = decodeTemperatures(unset);

    expect(Object.values(value).every((field) => field === null)).toBe(true);
    expect(encodeTemperatures(value)).toEqual(unset);
  });

  it("writes the current temperature and left out fields as unset", () => {
    const data = encodeTemperatures({
      current: Temperature.fromCelsius(25),
      manual: Temperature.fromCelsius(20.5),
      targetHigh: Temperature.fromCelsius(22),
    });

    expect([...data]).toEqual([0x80, 41, 0x80, 44, 0x80, 0x80, 0x80]);
  });

  it("rejects window settings that don't fit a signed byte", () => {
    expect(() => encodeTemperatures({ windowOpenMinutes: 200 })).toThrow(EncodingRangeError);
  });

  it("rejects buffers of wrong length", () => {
    expect(() => decodeTemperatures(Buffer.alloc(6))).toThrow(MalformedDataError);
  });
});
