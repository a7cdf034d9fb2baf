/**
 * Read cursor over an immutable byte buffer.
 *
 * All parsers share one Scanner per file. Reads past the end return -1
 * instead of throwing so that tokenizers can treat EOF as a terminator.
 */
export class Scanner {
  private _position = 0;

  constructor(readonly bytes: Uint8Array) {}

  get position(): number {
    return this._position;
  }

  get length(): number {
    return this.bytes.length;
  }

  get isAtEnd(): boolean {
    return this._position >= this.bytes.length;
  }

  /** Byte at the cursor, or -1 at EOF. */
  peek(): number {
    return this.peekAt(this._position);
  }

  /** Byte at an absolute offset, or -1 when out of range. */
  peekAt(offset: number): number {
    if (offset < 0 || offset >= this.bytes.length) {
      return -1;
    }

    return this.bytes[offset];
  }

  /** Consume and return the byte at the cursor, or -1 at EOF. */
  advance(): number {
    const byte = this.peek();

    if (byte !== -1) {
      this._position++;
    }

    return byte;
  }

  /**
   * Move the cursor. Offsets are clamped to `[0, length]`.
   */
  moveTo(offset: number): void {
    this._position = Math.max(0, Math.min(offset, this.bytes.length));
  }

  /** A view (not a copy) of `length` bytes starting at `offset`. */
  slice(offset: number, length: number): Uint8Array {
    return this.bytes.subarray(offset, Math.min(offset + length, this.bytes.length));
  }
}
