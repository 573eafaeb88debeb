import { AnimDataReader } from './animdata-reader.ts';
import { AnimDataWriter } from './animdata-writer.ts';
import { BUCKET_COUNT, hashIdentifier } from './structure/hash.ts';
import {
  type AnimationRecord,
  type RecordOptions,
  RECORD_SIZE,
  readRecord,
  writeRecord,
} from './structure/record.ts';
import {
  ParserExtraDataException,
  ParserHashMismatchException,
  ParserOutOfBoundException,
} from '../error/errors.ts';

/** Size of the record count preceding each bucket */
export const BUCKET_HEADER_SIZE = 4;

/**
 * Decode an animation table.
 *
 * Records come out bucket by bucket, in their order within each bucket.
 * Every record must sit in the bucket of its identifier hash, and the
 * 256 buckets must span the whole input.
 */
export function decodeTable(data: Uint8Array | ArrayBuffer, options: RecordOptions = {}): AnimationRecord[] {
  const reader = new AnimDataReader(data);
  const records: AnimationRecord[] = [];

  for (let bucket = 0; bucket < BUCKET_COUNT; bucket++) {
    if (reader.remaining() < BUCKET_HEADER_SIZE) {
      throw new ParserOutOfBoundException(
        `Cannot unpack record count for bucket ${bucket} at offset ${reader.offset}`,
        reader.offset,
      );
    }
    const count = reader.readUI32();

    for (let i = 0; i < count; i++) {
      const offset = reader.offset;
      const record = readRecord(reader, options);
      const hash = hashIdentifier(record.identifier);
      if (hash !== bucket) {
        throw ParserHashMismatchException.create(offset, record.identifier, bucket, hash);
      }
      records.push(record);
    }
  }

  if (reader.offset !== reader.end) {
    throw ParserExtraDataException.createSizeMismatch(reader.offset, reader.end);
  }

  return records;
}

/**
 * Route records into their hash buckets, keeping input order within each bucket.
 * Duplicates are kept.
 */
export function groupByBucket(records: Iterable<AnimationRecord>): AnimationRecord[][] {
  return routeToBuckets(records, (record) => record.identifier);
}

function routeToBuckets<T>(items: Iterable<T>, identifierOf: (item: T) => string): T[][] {
  const buckets: T[][] = Array.from({ length: BUCKET_COUNT }, () => []);
  for (const item of items) {
    buckets[hashIdentifier(identifierOf(item))]!.push(item);
  }
  return buckets;
}

/**
 * Compute the encoded size of a table holding `recordCount` records.
 */
export function tableSize(recordCount: number): number {
  return BUCKET_COUNT * BUCKET_HEADER_SIZE + recordCount * RECORD_SIZE;
}

/**
 * Encode records into an animation table.
 * Fails with a RecordValidationException carrying the input index of an invalid record.
 */
export function encodeTable(records: Iterable<AnimationRecord>, options: RecordOptions = {}): Uint8Array {
  const indexed = Array.from(records, (record, index) => ({ record, index }));
  const buckets = routeToBuckets(indexed, (entry) => entry.record.identifier);

  const writer = new AnimDataWriter(tableSize(indexed.length));
  for (const bucket of buckets) {
    writer.writeUI32(bucket.length);
    for (const { record, index } of bucket) {
      writeRecord(writer, record, index, options);
    }
  }

  if (!writer.isComplete()) {
    throw new Error(`Encoded ${writer.offset} bytes, expected ${writer.data.length}`);
  }
  return writer.data;
}
