import { match } from 'ts-pattern';
import { AnimDataReader } from '../animdata-reader.ts';
import { AnimDataWriter } from '../animdata-writer.ts';
import {
  ParserOutOfBoundException,
  ParserInvalidDataException,
  RecordValidationException,
} from '../../error/errors.ts';
import { type Result, ok, err } from './result.ts';
import {
  type Trigger,
  type TriggerInput,
  type TriggerViolation,
  FRAME_MAX,
  TRIGGER_CODE_MIN,
  TRIGGER_CODE_MAX,
  createTriggers,
  decodeFrames,
  encodeFrames,
} from './trigger.ts';

/** Number of characters in an identifier */
export const IDENTIFIER_LENGTH = 7;

/** Size of the null-padded identifier field */
export const IDENTIFIER_FIELD_SIZE = 8;

/** Largest value of an unsigned 32-bit field */
export const DWORD_MAX = 0xffffffff;

/** Size of one encoded record: identifier, frames per direction, speed, frame codes */
export const RECORD_SIZE = IDENTIFIER_FIELD_SIZE + 4 + 4 + FRAME_MAX;

/**
 * Metadata of one animation.
 * Instances are frozen; build a new one through createRecord to change a field.
 */
export interface AnimationRecord {
  readonly identifier: string;
  readonly framesPerDirection: number;
  readonly speed: number;
  /** Sorted by frame, at most one per frame */
  readonly triggers: readonly Trigger[];
}

/**
 * Fields accepted by the record factory.
 */
export interface RecordInput {
  readonly identifier: string;
  readonly framesPerDirection: number;
  readonly speed: number;
  readonly triggers?: TriggerInput;
}

export interface RecordOptions {
  /** Reject triggers at or past framesPerDirection instead of leaving them to diagnostics */
  readonly strictTriggerFrames?: boolean;
}

export type RecordViolation =
  | { readonly kind: 'identifier-length'; readonly field: 'identifier'; readonly identifier: string }
  | { readonly kind: 'identifier-null'; readonly field: 'identifier'; readonly identifier: string }
  | { readonly kind: 'identifier-ascii'; readonly field: 'identifier'; readonly identifier: string }
  | {
      readonly kind: 'dword-range';
      readonly field: 'framesPerDirection' | 'speed';
      readonly value: number;
    }
  | {
      readonly kind: 'trigger-beyond-frames';
      readonly field: 'triggers';
      readonly frame: number;
      readonly framesPerDirection: number;
    }
  | TriggerViolation;

/**
 * Validate fields and build a frozen record.
 */
export function createRecord(input: RecordInput, options: RecordOptions = {}): Result<AnimationRecord, RecordViolation> {
  const { identifier, framesPerDirection, speed } = input;

  if (identifier.length !== IDENTIFIER_LENGTH) {
    return err({ kind: 'identifier-length', field: 'identifier', identifier });
  }
  if (identifier.includes('\0')) {
    return err({ kind: 'identifier-null', field: 'identifier', identifier });
  }
  if (!/^[\x00-\x7f]*$/.test(identifier)) {
    return err({ kind: 'identifier-ascii', field: 'identifier', identifier });
  }
  if (!isDword(framesPerDirection)) {
    return err({ kind: 'dword-range', field: 'framesPerDirection', value: framesPerDirection });
  }
  if (!isDword(speed)) {
    return err({ kind: 'dword-range', field: 'speed', value: speed });
  }

  const triggers = createTriggers(input.triggers ?? []);
  if (!triggers.ok) return triggers;

  if (options.strictTriggerFrames) {
    const beyond = triggers.value.find((trigger) => trigger.frame >= framesPerDirection);
    if (beyond) {
      return err({ kind: 'trigger-beyond-frames', field: 'triggers', frame: beyond.frame, framesPerDirection });
    }
  }

  return ok(Object.freeze({ identifier, framesPerDirection, speed, triggers: triggers.value }));
}

/**
 * Validate fields and build a frozen record, throwing on the first violation.
 */
export function recordFrom(input: RecordInput, options: RecordOptions = {}): AnimationRecord {
  const result = createRecord(input, options);
  if (!result.ok) {
    throw new RecordValidationException(describeViolation(result.error), result.error, undefined, input.identifier);
  }
  return result.value;
}

function isDword(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= DWORD_MAX;
}

/**
 * Human-readable explanation of a violation.
 */
export function describeViolation(violation: RecordViolation): string {
  return match(violation)
    .with({ kind: 'identifier-length' }, ({ identifier }) =>
      `Identifier must have exactly ${IDENTIFIER_LENGTH} characters (${JSON.stringify(identifier)} has ${identifier.length})`,
    )
    .with({ kind: 'identifier-null' }, ({ identifier }) =>
      `Identifier must not contain a null character (found in ${JSON.stringify(identifier)})`,
    )
    .with({ kind: 'identifier-ascii' }, ({ identifier }) =>
      `Identifier must only contain ASCII characters (got ${JSON.stringify(identifier)})`,
    )
    .with({ kind: 'dword-range' }, ({ field, value }) =>
      `${field} must be an integer between 0 and ${DWORD_MAX} (got ${value})`,
    )
    .with({ kind: 'trigger-frame' }, ({ frame }) =>
      `Trigger frame must be an integer between 0 and ${FRAME_MAX - 1} (got ${frame})`,
    )
    .with({ kind: 'trigger-code' }, ({ frame, code }) =>
      `Trigger code must be an integer between ${TRIGGER_CODE_MIN} and ${TRIGGER_CODE_MAX} (got ${code} at frame ${frame})`,
    )
    .with({ kind: 'duplicate-frame' }, ({ frame }) => `Cannot assign another trigger to frame ${frame}`)
    .with({ kind: 'trigger-beyond-frames' }, ({ frame, framesPerDirection }) =>
      `Trigger frame ${frame} is not lower than framesPerDirection (${framesPerDirection})`,
    )
    .exhaustive();
}

/**
 * Read a single record at the reader's offset.
 */
export function readRecord(reader: AnimDataReader, options: RecordOptions = {}): AnimationRecord {
  const offset = reader.offset;
  if (reader.remaining() < RECORD_SIZE) {
    throw new ParserOutOfBoundException(
      `Cannot unpack record at offset ${offset}: ${RECORD_SIZE} bytes needed, ${reader.remaining()} available`,
      offset,
    );
  }

  const identifier = reader.readPaddedAscii(IDENTIFIER_FIELD_SIZE);
  const framesPerDirection = reader.readUI32();
  const speed = reader.readUI32();
  const triggers = decodeFrames(reader.readBytes(FRAME_MAX));

  const result = createRecord({ identifier, framesPerDirection, speed, triggers }, options);
  if (!result.ok) {
    throw new ParserInvalidDataException(
      `Invalid record field at offset ${offset}: ${describeViolation(result.error)}`,
      offset,
      result.error,
    );
  }
  return result.value;
}

/**
 * Decode a single record from `data` at `offset`.
 * Returns the record and the number of bytes consumed.
 */
export function decodeRecord(
  data: Uint8Array,
  offset: number = 0,
  options: RecordOptions = {},
): [record: AnimationRecord, size: number] {
  if (!Number.isInteger(offset) || offset < 0) {
    throw new ParserOutOfBoundException(
      `Cannot unpack record at offset ${offset}: offset must be a non-negative integer`,
      offset,
    );
  }

  const reader = new AnimDataReader(data);
  reader.offset = offset;
  return [readRecord(reader, options), RECORD_SIZE];
}

/**
 * Write a single record, validating it first.
 * `index` locates the record in its list for error reporting.
 */
export function writeRecord(
  writer: AnimDataWriter,
  record: AnimationRecord,
  index?: number,
  options: RecordOptions = {},
): void {
  const result = createRecord(record, options);
  if (!result.ok) {
    const location = index !== undefined ? `Record ${index}` : 'Record';
    throw new RecordValidationException(
      `${location} (${JSON.stringify(record.identifier)}) is invalid: ${describeViolation(result.error)}`,
      result.error,
      index,
      record.identifier,
    );
  }

  const valid = result.value;
  writer.writePaddedAscii(valid.identifier, IDENTIFIER_FIELD_SIZE);
  writer.writeUI32(valid.framesPerDirection);
  writer.writeUI32(valid.speed);
  writer.writeBytes(encodeFrames(valid.triggers));
}

/**
 * Encode a single record.
 */
export function encodeRecord(record: AnimationRecord, options: RecordOptions = {}): Uint8Array {
  const writer = new AnimDataWriter(RECORD_SIZE);
  writeRecord(writer, record, undefined, options);
  return writer.data;
}

/**
 * Return a copy of the records ordered by identifier.
 */
export function sortRecordsByIdentifier(records: readonly AnimationRecord[]): AnimationRecord[] {
  return [...records].sort((a, b) => (a.identifier < b.identifier ? -1 : a.identifier > b.identifier ? 1 : 0));
}
