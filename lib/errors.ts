/**
 * Thrown when a buffer read from the device has the wrong length or carries
 * a field outside of its valid range.
 */
export class MalformedDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedDataError";
  }
}

/**
 * Thrown when a value cannot be represented in the device's wire format.
 */
export class EncodingRangeError extends RangeError {
  constructor(message: string) {
    super(message);
    this.name = "EncodingRangeError";
  }
}

export class TooManyPeriodsError extends Error {
  constructor(public readonly count: number) {
    super(`A day holds at most 4 periods, got ${count}`);
    this.name = "TooManyPeriodsError";
  }
}

export class InvalidPinError extends Error {
  constructor(pin: number) {
    super(`PIN must be an unsigned 32-bit integer, got ${pin}`);
    this.name = "InvalidPinError";
  }
}

/**
 * Thrown by `CometBlue` when talking to the peripheral fails.
 */
export class DeviceError extends Error {
  constructor(
    public readonly address: string,
    message: string
  ) {
    super(`${address}: ${message}`);
    this.name = "DeviceError";
  }
}
