import BinaryWriter from "../binary-writer";
import { InvalidPinError } from "../errors";

export const PIN_LENGTH = 4;

/**
 * Encodes the numeric PIN into the payload of the PIN characteristic.
 * The device expects it before any protected read or write.
 */
export function encodePin(pin: number): Buffer {
  if (!Number.isInteger(pin) || pin < 0 || pin > 0xffffffff) {
    throw new InvalidPinError(pin);
  }
  const writer = new BinaryWriter();
  writer.writeUInt32LE(pin);
  return writer.toBuffer();
}
