export default class BinaryWriter {
  public data: Array<number> = [];

  /**
   * Appends a byte array to the data array.
   * @param b
   */
  public write(b: ArrayLike<number>) {
    this.data.push(...Array.from(b));
  }

  /**
   * Appends a `byte`/`uint8` to the data array.
   * @param b
   */
  public writeUInt8(b: number) {
    this.data.push(b & 255);
  }

  /**
   * Appends a signed `int8` in two's complement.
   * @param b
   */
  public writeInt8(b: number) {
    this.data.push(b & 255);
  }

  /**
   * Appends a little-endian `uint32` to the data array.
   * @param i
   */
  public writeUInt32LE(i: number) {
    this.data.push(i & 255);
    this.data.push((i >>> 8) & 255);
    this.data.push((i >>> 16) & 255);
    this.data.push((i >>> 24) & 255);
  }

  public toBuffer() {
    return Buffer.from(this.data);
  }
}
