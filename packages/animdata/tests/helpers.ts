import { type AnimationRecord, type RecordInput, recordFrom } from '../src/parser/structure/record.ts';

export function sampleRecord(overrides: Partial<RecordInput> = {}): AnimationRecord {
  return recordFrom({
    identifier: 'AAAAAAA',
    framesPerDirection: 20,
    speed: 256,
    triggers: { 5: 1, 10: 2 },
    ...overrides,
  });
}

/**
 * Run `fn` and return what it throws, narrowed to `type`.
 */
export function catchError<T extends Error>(fn: () => unknown, type: new (...args: never[]) => T): T {
  try {
    fn();
  } catch (e) {
    if (e instanceof type) return e;
    throw e;
  }
  throw new Error(`Expected ${type.name} to be thrown`);
}
