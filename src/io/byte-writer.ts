/**
 * Append-only output buffer for serialized objects and whole files.
 *
 * `position` doubles as the file offset of the next byte, which is what
 * cross-reference entries record.
 */

export interface ByteWriterOptions {
  /** Initial capacity in bytes. Default: 64KB */
  initialSize?: number;
}

const DEFAULT_CAPACITY = 64 * 1024;

export class ByteWriter {
  private buffer: Uint8Array;
  private length = 0;

  constructor(options: ByteWriterOptions = {}) {
    this.buffer = new Uint8Array(Math.max(1, options.initialSize ?? DEFAULT_CAPACITY));
  }

  /** Number of bytes written so far. */
  get position(): number {
    return this.length;
  }

  writeByte(byte: number): void {
    this.reserve(1);
    this.buffer[this.length++] = byte;
  }

  writeBytes(data: Uint8Array): void {
    this.reserve(data.length);
    this.buffer.set(data, this.length);
    this.length += data.length;
  }

  /**
   * Write a string one byte per character. Callers pass keywords, numbers
   * and escaped names, which are all ASCII.
   */
  writeAscii(str: string): void {
    this.reserve(str.length);

    for (let i = 0; i < str.length; i++) {
      this.buffer[this.length++] = str.charCodeAt(i) & 0xff;
    }
  }

  /**
   * Write `value` as an unsigned big-endian integer of exactly `width`
   * bytes, as cross-reference stream fields are stored. A width of 0
   * writes nothing.
   *
   * @throws {RangeError} if the value does not fit
   */
  writeUint(value: number, width: number): void {
    if (value < 0 || !Number.isInteger(value) || value >= 256 ** width) {
      throw new RangeError(`${value} does not fit in ${width} bytes`);
    }

    this.reserve(width);

    for (let i = width - 1; i >= 0; i--) {
      this.buffer[this.length + i] = value % 256;
      value = Math.floor(value / 256);
    }

    this.length += width;
  }

  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }

  private reserve(count: number): void {
    const required = this.length + count;

    if (required <= this.buffer.length) {
      return;
    }

    let capacity = this.buffer.length;

    while (capacity < required) {
      capacity *= 2;
    }

    const grown = new Uint8Array(capacity);

    grown.set(this.buffer.subarray(0, this.length));
    this.buffer = grown;
  }
}
