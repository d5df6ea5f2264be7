import { EncodingRangeError } from "./errors";

/**
 * Temperature with half-degree resolution, stored as an integer number of
 * half degrees Celsius.
 */
export default class Temperature {
  private constructor(public readonly halfDegrees: number) {}

  public static fromHalfDegrees(halfDegrees: number) {
    if (!Number.isInteger(halfDegrees)) {
      throw new EncodingRangeError(`Half-degree count must be an integer, got ${halfDegrees}`);
    }
    // Normalize -0.
    return new Temperature(halfDegrees === 0 ? 0 : halfDegrees);
  }

  /**
   * Rounds given value to the nearest half degree.
   * @param celsius
   */
  public static fromCelsius(celsius: number) {
    if (!Number.isFinite(celsius)) {
      throw new EncodingRangeError(`Temperature must be a finite number, got ${celsius}`);
    }
    return Temperature.fromHalfDegrees(Math.round(celsius * 2));
  }

  public get celsius() {
    return this.halfDegrees / 2;
  }

  public toJSON() {
    return this.celsius;
  }

  public toString() {
    return `${this.celsius.toFixed(1)}°C`;
  }
}
