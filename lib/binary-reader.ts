import { MalformedDataError } from "./errors";

export default class BinaryReader {
  private offset = 0;

  constructor(private readonly data: Buffer) {}

  /**
   * Reads next `byte`/`uint8`.
   */
  public readUInt8() {
    this.ensureAvailable(1);
    return this.data[this.offset++];
  }

  /**
   * Reads next signed `int8`.
   */
  public readInt8() {
    const b = this.readUInt8();
    return b > 127 ? b - 256 : b;
  }

  /**
   * Reads next `length` bytes as a new buffer.
   * @param length
   */
  public readBytes(length: number) {
    this.ensureAvailable(length);
    const bytes = this.data.subarray(this.offset, this.offset + length);
    this.offset += length;
    return Buffer.from(bytes);
  }

  private ensureAvailable(length: number) {
    if (this.offset + length > this.data.length) {
      throw new MalformedDataError(
        `Unexpected end of data (offset=${this.offset}, wanted=${length}, length=${this.data.length})`
      );
    }
  }
}

/**
 * Fails unless `data` is exactly `length` bytes long.
 */
export function expectLength(data: Buffer, length: number, what: string) {
  if (data.length !== length) {
    throw new MalformedDataError(`${what} must be ${length} bytes long, got ${data.length}`);
  }
}
