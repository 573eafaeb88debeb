import { ParserOutOfBoundException } from '../error/errors.ts';

/**
 * Low-level animation table primitives writer.
 * Writes into a buffer allocated up front; overflowing it is a bug in the caller's size computation.
 */
export class AnimDataWriter {
  /** Output buffer */
  public readonly data: Uint8Array;

  /** DataView for writing multi-byte values */
  private readonly view: DataView;

  /** Current byte offset in the output */
  private _offset: number = 0;

  constructor(size: number) {
    this.data = new Uint8Array(size);
    this.view = new DataView(this.data.buffer);
  }

  get offset(): number {
    return this._offset;
  }

  private ensure(num: number): void {
    if (this._offset + num > this.data.length) {
      throw ParserOutOfBoundException.createWriteTooManyBytes(this._offset, this.data.length, num);
    }
  }

  /** Write multiple bytes */
  writeBytes(bytes: Uint8Array): void {
    this.ensure(bytes.length);
    this.data.set(bytes, this._offset);
    this._offset += bytes.length;
  }

  /**
   * Write an ASCII string left-justified in a null-padded field of `size` bytes.
   */
  writePaddedAscii(value: string, size: number): void {
    this.ensure(size);
    for (let i = 0; i < size; i++) {
      this.data[this._offset + i] = i < value.length ? value.charCodeAt(i) : 0;
    }
    this._offset += size;
  }

  /** Write unsigned 32-bit integer (little-endian) */
  writeUI32(value: number): void {
    this.ensure(4);
    this.view.setUint32(this._offset, value, true);
    this._offset += 4;
  }

  /**
   * Check that the buffer has been filled exactly.
   */
  isComplete(): boolean {
    return this._offset === this.data.length;
  }
}
