import { describe, expect, it } from "vitest";
import { normalizeAddress, offsetUuid, toShortUuid, withTimeout } from "../lib/utils";

describe("utils", () => {
  it("shortens UUIDs based on the Bluetooth base UUID", () => {
    expect(toShortUuid("00002a00-0000-1000-8000-00805f9b34fb")).toBe("2a00");
    expect(toShortUuid("47E9EE01-47e9-11e4-8939-164230d1df67")).toBe(
      "47e9ee0147e911e48939164230d1df67"
    );
  });

  it("offsets the first UUID field", () => {
    expect(offsetUuid("0000000f-47e9-11e4-8939-164230d1df67", 1)).toBe(
      "00000010-47e9-11e4-8939-164230d1df67"
    );
  });

  it("normalizes addresses", () => {
    expect(normalizeAddress("E0-E5-CF-00-11-22")).toBe("e0:e5:cf:00:11:22");
  });

  it("rejects when the promise does not settle in time", async () => {
    const never = new Promise<number>(() => {});
    await expect(withTimeout(never, 5, () => new Error("too slow"))).rejects.toThrow("too slow");
  });

  it("resolves with the value of a settled promise", async () => {
    await expect(withTimeout(Promise.resolve(42), 1000, () => new Error("too slow"))).resolves.toBe(
      42
    );
  });
});
