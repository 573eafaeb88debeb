import { type Result, ok, err } from './result.ts';

/**
 * Number of frame code slots in a record.
 * Trigger frames must be strictly lower.
 */
export const FRAME_MAX = 144;

export const TRIGGER_CODE_MIN = 1;
export const TRIGGER_CODE_MAX = 3;

/**
 * Event cue fired on a given animation frame.
 */
export interface Trigger {
  readonly frame: number;
  readonly code: number;
}

export type TriggerTuple = readonly [frame: number, code: number];

/**
 * Accepted trigger inputs: pairs, tuples, or a frame -> code mapping.
 * Mapping keys may be numeric strings, as produced by JSON.
 */
export type TriggerInput = Iterable<Trigger | TriggerTuple> | Readonly<Record<string, number>>;

export type TriggerViolation =
  | { readonly kind: 'trigger-frame'; readonly field: 'triggers'; readonly frame: number }
  | { readonly kind: 'trigger-code'; readonly field: 'triggers'; readonly frame: number; readonly code: number }
  | { readonly kind: 'duplicate-frame'; readonly field: 'triggers'; readonly frame: number };

/**
 * Create a single validated trigger.
 */
export function createTrigger(frame: number, code: number): Result<Trigger, TriggerViolation> {
  if (!Number.isInteger(frame) || frame < 0 || frame >= FRAME_MAX) {
    return err({ kind: 'trigger-frame', field: 'triggers', frame });
  }
  if (!Number.isInteger(code) || code < TRIGGER_CODE_MIN || code > TRIGGER_CODE_MAX) {
    return err({ kind: 'trigger-code', field: 'triggers', frame, code });
  }
  return ok(Object.freeze({ frame, code }));
}

/**
 * Create a validated trigger list, sorted by frame.
 * Two triggers on the same frame are rejected whatever their codes.
 */
export function createTriggers(input: TriggerInput): Result<readonly Trigger[], TriggerViolation> {
  const triggers: Trigger[] = [];
  const frames = new Set<number>();

  for (const [frame, code] of triggerEntries(input)) {
    const result = createTrigger(frame, code);
    if (!result.ok) return result;

    if (frames.has(frame)) {
      return err({ kind: 'duplicate-frame', field: 'triggers', frame });
    }
    frames.add(frame);
    triggers.push(result.value);
  }

  triggers.sort((a, b) => a.frame - b.frame);
  return ok(Object.freeze(triggers));
}

function* triggerEntries(input: TriggerInput): Generator<TriggerTuple> {
  if (isIterable(input)) {
    for (const entry of input) {
      yield isTriggerTuple(entry) ? entry : [entry.frame, entry.code];
    }
    return;
  }

  for (const [key, code] of Object.entries(input)) {
    yield [/^\d+$/.test(key) ? Number(key) : Number.NaN, code];
  }
}

function isIterable(input: TriggerInput): input is Iterable<Trigger | TriggerTuple> {
  return Symbol.iterator in input;
}

function isTriggerTuple(entry: Trigger | TriggerTuple): entry is TriggerTuple {
  return Array.isArray(entry);
}

/**
 * Expand triggers into one code per frame (0 = no trigger).
 */
export function encodeFrames(triggers: Iterable<Trigger>): Uint8Array {
  const codes = new Uint8Array(FRAME_MAX);
  for (const trigger of triggers) {
    codes[trigger.frame] = trigger.code;
  }
  return codes;
}

/**
 * Collect a trigger for every non-zero frame code.
 * Codes are passed through as read; range checks happen at record construction.
 */
export function decodeFrames(codes: Uint8Array): Trigger[] {
  const triggers: Trigger[] = [];
  const length = Math.min(codes.length, FRAME_MAX);
  for (let frame = 0; frame < length; frame++) {
    const code = codes[frame]!;
    if (code !== 0) {
      triggers.push({ frame, code });
    }
  }
  return triggers;
}
