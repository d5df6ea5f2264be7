import { describe, expect, it } from "vitest";
import { TEMPERATURE_UNSET, decodeTemperature, encodeTemperature } from "../../lib/codecs/temperature";
import { EncodingRangeError, MalformedDataError } from "../../lib/errors";
import Temperature from "../../lib/temperature";

describe("temperature codec", () => {
  it("encodes 23.0°C as 0x2E", () => {
    expect(encodeTemperature(Temperature.fromCelsius(23))).toBe(0x2e);
  });

  it("decodes 0x2E as 23.0°C", () => {
    expect(decodeTemperature(0x2e)?.celsius).toBe(23);
  });

  it("decodes negative values from two's complement", () => {
    expect(decodeTemperature(0xff)?.celsius).toBe(-0.5);
    expect(decodeTemperature(0x81)?.celsius).toBe(-63.5);
    expect(decodeTemperature(0x7f)?.celsius).toBe(63.5);
  });

  it("decodes the sentinel as absent, never as -64", () => {
    expect(decodeTemperature(0x80)).toBeNull();
  });

  it("re-emits the sentinel for absent values", () => {
    expect(encodeTemperature(null)).toBe(TEMPERATURE_UNSET);
    expect(encodeTemperature(decodeTemperature(TEMPERATURE_UNSET))).toBe(0x80);
  });

  it("round-trips every representable half degree", () => {
    for (let halfDegrees = -127; halfDegrees <= 127; halfDegrees++) {
      const temperature = Temperature.fromHalfDegrees(halfDegrees);
      expect(decodeTemperature(encodeTemperature(temperature))).toEqual(temperature);
    }
  });

  it("rounds to the nearest half degree", () => {
    expect(Temperature.fromCelsius(21.3).halfDegrees).toBe(43);
    expect(Temperature.fromCelsius(21.2).celsius).toBe(21);
  });

  it("rejects temperatures outside of the signed byte range", () => {
    expect(() => encodeTemperature(Temperature.fromCelsius(64))).toThrow(EncodingRangeError);
    expect(() => encodeTemperature(Temperature.fromCelsius(-64))).toThrow(RangeError);
  });

  it("rejects non-finite temperatures", () => {
    expect(() => Temperature.fromCelsius(Number.NaN)).toThrow(EncodingRangeError);
  });

  it("rejects bytes outside of 0-255", () => {
    expect(() => decodeTemperature(256)).toThrow(MalformedDataError);
    expect(() => decodeTemperature(-1)).toThrow(MalformedDataError);
  });
});
