import { ParserOutOfBoundException, ParserInvalidEncodingException } from '../error/errors.ts';

/**
 * Low-level animation table primitives parser.
 * This class is mutable and stateful; every read is bounds checked.
 */
export class AnimDataReader {
  /** Binary data of the animation table */
  public readonly data: Uint8Array;

  /** DataView for reading multi-byte values */
  private readonly view: DataView;

  /** The end offset of the binary data (exclusive) */
  public readonly end: number;

  /** Current byte offset in the binary data */
  private _offset: number = 0;

  constructor(data: Uint8Array | ArrayBuffer, end?: number) {
    this.data = data instanceof ArrayBuffer ? new Uint8Array(data) : data;
    this.view = new DataView(this.data.buffer, this.data.byteOffset, this.data.byteLength);
    this.end = Math.min(end ?? this.data.length, this.data.length);
  }

  get offset(): number {
    return this._offset;
  }

  set offset(value: number) {
    this._offset = value;
  }

  /**
   * Fail unless `num` bytes are available at the current offset.
   */
  ensure(num: number): void {
    if (this._offset + num > this.end) {
      throw ParserOutOfBoundException.createReadTooManyBytes(this._offset, this.end, num);
    }
  }

  /**
   * Read multiple bytes from the binary data.
   */
  readBytes(num: number): Uint8Array {
    this.ensure(num);
    const result = this.data.slice(this._offset, this._offset + num);
    this._offset += num;
    return result;
  }

  /**
   * Read a fixed-size, null-padded ASCII string.
   * Only the bytes before the first null are significant.
   */
  readPaddedAscii(size: number): string {
    const start = this._offset;
    const bytes = this.readBytes(size);
    const terminator = bytes.indexOf(0);
    const significant = terminator === -1 ? bytes : bytes.subarray(0, terminator);

    let result = '';
    for (let i = 0; i < significant.length; i++) {
      const byte = significant[i]!;
      if (byte > 0x7f) {
        throw new ParserInvalidEncodingException(
          `Cannot decode byte 0x${byte.toString(16)} at offset ${start + i} as ASCII`,
          start,
        );
      }
      result += String.fromCharCode(byte);
    }
    return result;
  }

  /** Read unsigned 32-bit integer (little-endian) */
  readUI32(): number {
    this.ensure(4);
    const value = this.view.getUint32(this._offset, true);
    this._offset += 4;
    return value;
  }

  /**
   * Get remaining byte count.
   */
  remaining(): number {
    return Math.max(0, this.end - this._offset);
  }
}
