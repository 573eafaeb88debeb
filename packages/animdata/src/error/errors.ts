import type { RecordViolation } from '../parser/structure/record.ts';

/**
 * Error categories.
 * Format and data errors come from decoding, validation errors from caller input.
 */
export const ErrorCategory = {
  /** The byte stream is structurally malformed */
  FORMAT: 'format',
  /** A well-formed region decodes to a value breaking a record invariant */
  DATA: 'data',
  /** Caller-provided record or text input is invalid */
  VALIDATION: 'validation',
} as const;

export type ErrorCategoryValue = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/**
 * Base class for all animdata exceptions
 */
export abstract class AnimDataException extends Error {
  abstract readonly category: ErrorCategoryValue;
}

/**
 * Exception thrown when parser reads beyond available data
 */
export class ParserOutOfBoundException extends AnimDataException {
  readonly category = ErrorCategory.FORMAT;

  constructor(
    message: string,
    public readonly offset: number,
  ) {
    super(message);
    this.name = 'ParserOutOfBoundException';
  }

  static createReadTooManyBytes(offset: number, end: number, requested: number): ParserOutOfBoundException {
    return new ParserOutOfBoundException(
      `Cannot read ${requested} bytes at offset ${offset}: only ${Math.max(end - offset, 0)} bytes available`,
      offset,
    );
  }

  static createWriteTooManyBytes(offset: number, end: number, requested: number): ParserOutOfBoundException {
    return new ParserOutOfBoundException(
      `Cannot write ${requested} bytes at offset ${offset}: buffer ends at ${end}`,
      offset,
    );
  }
}

/**
 * Exception thrown when data remains after the last bucket
 */
export class ParserExtraDataException extends AnimDataException {
  readonly category = ErrorCategory.FORMAT;

  constructor(
    message: string,
    public readonly offset: number,
    public readonly extraLength: number,
  ) {
    super(message);
    this.name = 'ParserExtraDataException';
  }

  static createSizeMismatch(offset: number, length: number): ParserExtraDataException {
    return new ParserExtraDataException(
      `Data size mismatch: buckets use ${offset} bytes, but binary size is ${length} bytes`,
      offset,
      length - offset,
    );
  }
}

/**
 * Exception thrown when an identifier field holds bytes outside ASCII
 */
export class ParserInvalidEncodingException extends AnimDataException {
  readonly category = ErrorCategory.FORMAT;

  constructor(
    message: string,
    public readonly offset: number,
  ) {
    super(message);
    this.name = 'ParserInvalidEncodingException';
  }
}

/**
 * Exception thrown when a decoded record breaks a record invariant
 */
export class ParserInvalidDataException extends AnimDataException {
  readonly category = ErrorCategory.DATA;

  constructor(
    message: string,
    public readonly offset: number,
    public readonly violation?: RecordViolation,
  ) {
    super(message);
    this.name = 'ParserInvalidDataException';
  }
}

/**
 * Exception thrown when a record sits in a bucket other than its identifier hash
 */
export class ParserHashMismatchException extends AnimDataException {
  readonly category = ErrorCategory.DATA;

  constructor(
    message: string,
    public readonly offset: number,
    public readonly identifier: string,
    public readonly bucket: number,
    public readonly hash: number,
  ) {
    super(message);
    this.name = 'ParserHashMismatchException';
  }

  static create(offset: number, identifier: string, bucket: number, hash: number): ParserHashMismatchException {
    return new ParserHashMismatchException(
      `Incorrect hash for ${JSON.stringify(identifier)} at offset ${offset}: expected ${bucket} but got ${hash}`,
      offset,
      identifier,
      bucket,
      hash,
    );
  }
}

/**
 * Exception thrown when a record cannot be encoded
 */
export class RecordValidationException extends AnimDataException {
  readonly category = ErrorCategory.VALIDATION;

  constructor(
    message: string,
    public readonly violation: RecordViolation,
    public readonly index?: number,
    public readonly identifier?: string,
  ) {
    super(message);
    this.name = 'RecordValidationException';
  }

  /** Name of the record field the violation concerns */
  get field(): string {
    return this.violation.field;
  }
}

/**
 * Exception thrown while loading tabbed text.
 * Rows are counted from 0, starting at the first row after the header.
 */
export class TabbedTextException extends AnimDataException {
  readonly category = ErrorCategory.VALIDATION;

  constructor(
    message: string,
    public readonly row?: number,
    public readonly column?: number,
    public readonly columnName?: string,
  ) {
    super(message + describeLocation({ row, column, columnName }));
    this.name = 'TabbedTextException';
  }
}

/**
 * Exception thrown while loading JSON records
 */
export class JsonFormatException extends AnimDataException {
  readonly category = ErrorCategory.VALIDATION;

  constructor(
    message: string,
    public readonly index?: number,
    public readonly key?: string,
  ) {
    super(message + describeLocation({ index, key }));
    this.name = 'JsonFormatException';
  }
}

function describeLocation(fields: Record<string, string | number | undefined>): string {
  const parts = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([name, value]) => `${name}=${JSON.stringify(value)}`);
  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}
