import { isMatching, match, P } from 'ts-pattern';
import { JsonFormatException } from '../error/errors.ts';
import {
  type AnimationRecord,
  type RecordOptions,
  type RecordViolation,
  createRecord,
  describeViolation,
} from '../parser/structure/record.ts';

/**
 * Interchange form of a record.
 * Trigger keys are frame numbers; JSON objects only have string keys.
 */
export interface RecordJson {
  identifier: string;
  frames_per_direction: number;
  speed: number;
  triggers: Record<string, number>;
}

function isCodeMapping(value: unknown): value is Record<string, number> {
  return isObject(value) && Object.values(value).every((code) => typeof code === 'number');
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const triggerPairPattern = P.union({ frame: P.number, code: P.number }, [P.number, P.number]);

const triggersPattern = P.union(P.array(triggerPairPattern), P.when(isCodeMapping));

const recordPattern = {
  identifier: P.string,
  frames_per_direction: P.number,
  speed: P.number,
  triggers: P.optional(triggersPattern),
};

export function recordToJson(record: AnimationRecord): RecordJson {
  return {
    identifier: record.identifier,
    frames_per_direction: record.framesPerDirection,
    speed: record.speed,
    triggers: Object.fromEntries(record.triggers.map((trigger) => [String(trigger.frame), trigger.code])),
  };
}

/**
 * Serialize records as a JSON array (2-space indent, trailing newline).
 */
export function dumpJson(records: Iterable<AnimationRecord>): string {
  return JSON.stringify(Array.from(records, recordToJson), null, 2) + '\n';
}

/**
 * Build a record from its interchange form.
 * `triggers` may be a frame -> code mapping or a list of {frame, code} / [frame, code] pairs.
 */
export function recordFromJson(value: unknown, index?: number, options: RecordOptions = {}): AnimationRecord {
  if (!isMatching(recordPattern, value)) {
    throw new JsonFormatException('Invalid record', index, findInvalidKey(value));
  }

  const result = createRecord(
    {
      identifier: value.identifier,
      framesPerDirection: value.frames_per_direction,
      speed: value.speed,
      triggers: value.triggers ?? [],
    },
    options,
  );

  if (!result.ok) {
    throw new JsonFormatException(
      `Invalid record field: ${describeViolation(result.error)}`,
      index,
      violationKey(result.error),
    );
  }
  return result.value;
}

/**
 * Load records from a JSON array.
 */
export function loadJson(text: string, options: RecordOptions = {}): AnimationRecord[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    throw new JsonFormatException(`Cannot parse JSON: ${e instanceof Error ? e.message : String(e)}`);
  }

  if (!Array.isArray(data)) {
    throw new JsonFormatException('Expected an array of records');
  }
  return data.map((value: unknown, index) => recordFromJson(value, index, options));
}

function findInvalidKey(value: unknown): string | undefined {
  if (!isObject(value)) return undefined;

  if (!isMatching(P.string, value.identifier)) return 'identifier';
  if (!isMatching(P.number, value.frames_per_direction)) return 'frames_per_direction';
  if (!isMatching(P.number, value.speed)) return 'speed';
  if (value.triggers !== undefined && !isMatching(triggersPattern, value.triggers)) return 'triggers';
  return undefined;
}

function violationKey(violation: RecordViolation): keyof RecordJson {
  return match(violation.field)
    .with('identifier', () => 'identifier' as const)
    .with('framesPerDirection', () => 'frames_per_direction' as const)
    .with('speed', () => 'speed' as const)
    .with('triggers', () => 'triggers' as const)
    .exhaustive();
}
