import { match } from 'ts-pattern';
import type { AnimationRecord } from '../parser/structure/record.ts';

/**
 * Non-fatal finding about a record list.
 */
export type Diagnostic =
  | { readonly kind: 'duplicate-identifier'; readonly identifier: string }
  | {
      readonly kind: 'trigger-out-of-range';
      readonly identifier: string;
      readonly frame: number;
      readonly framesPerDirection: number;
    };

/**
 * Identifiers seen more than once.
 * Every occurrence after the first yields one entry, in encounter order.
 */
export function findDuplicateIdentifiers(records: Iterable<AnimationRecord>): string[] {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const record of records) {
    if (seen.has(record.identifier)) {
      duplicates.push(record.identifier);
    } else {
      seen.add(record.identifier);
    }
  }
  return duplicates;
}

/**
 * Trigger frames playback never reaches (frame >= framesPerDirection).
 */
export function findOutOfRangeTriggers(record: AnimationRecord): number[] {
  return record.triggers
    .filter((trigger) => trigger.frame >= record.framesPerDirection)
    .map((trigger) => trigger.frame);
}

/**
 * Run both checks over a record list.
 */
export function collectDiagnostics(records: readonly AnimationRecord[]): Diagnostic[] {
  const diagnostics: Diagnostic[] = findDuplicateIdentifiers(records).map((identifier): Diagnostic => ({
    kind: 'duplicate-identifier',
    identifier,
  }));

  for (const record of records) {
    for (const frame of findOutOfRangeTriggers(record)) {
      diagnostics.push({
        kind: 'trigger-out-of-range',
        identifier: record.identifier,
        frame,
        framesPerDirection: record.framesPerDirection,
      });
    }
  }

  return diagnostics;
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  return match(diagnostic)
    .with({ kind: 'duplicate-identifier' }, ({ identifier }) => `Duplicate entry found: ${identifier}`)
    .with(
      { kind: 'trigger-out-of-range' },
      ({ identifier, frame, framesPerDirection }) =>
        `Record ${identifier}: trigger frame ${frame} may have no effect because it is not lower than framesPerDirection (${framesPerDirection})`,
    )
    .exhaustive();
}
