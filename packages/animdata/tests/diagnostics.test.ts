import { describe, test, expect } from 'vitest';
import {
  collectDiagnostics,
  findDuplicateIdentifiers,
  findOutOfRangeTriggers,
  formatDiagnostic,
} from '../src/integrity/diagnostics.ts';
import { sampleRecord } from './helpers.ts';

describe('findDuplicateIdentifiers', () => {
  test('reports every repeat after the first occurrence', () => {
    const records = [
      sampleRecord(),
      sampleRecord({ identifier: 'BBBBBBB' }),
      sampleRecord({ speed: 1 }),
      sampleRecord({ identifier: 'BBBBBBB' }),
      sampleRecord({ speed: 2 }),
    ];

    expect(findDuplicateIdentifiers(records)).toEqual(['AAAAAAA', 'BBBBBBB', 'AAAAAAA']);
  });

  test('is case sensitive', () => {
    expect(findDuplicateIdentifiers([sampleRecord(), sampleRecord({ identifier: 'aaaaaaa' })])).toEqual([]);
  });
});

describe('findOutOfRangeTriggers', () => {
  test('lists frames not lower than framesPerDirection', () => {
    const record = sampleRecord({ framesPerDirection: 10, triggers: { 3: 1, 10: 2, 12: 3 } });
    expect(findOutOfRangeTriggers(record)).toEqual([10, 12]);
  });

  test('lists nothing when every trigger is reachable', () => {
    expect(findOutOfRangeTriggers(sampleRecord())).toEqual([]);
  });
});

describe('collectDiagnostics', () => {
  test('lists duplicates first, then unreachable triggers per record', () => {
    const records = [
      sampleRecord({ framesPerDirection: 6 }),
      sampleRecord({ identifier: 'BBBBBBB', framesPerDirection: 0, triggers: { 1: 3 } }),
      sampleRecord(),
    ];

    expect(collectDiagnostics(records)).toEqual([
      { kind: 'duplicate-identifier', identifier: 'AAAAAAA' },
      { kind: 'trigger-out-of-range', identifier: 'AAAAAAA', frame: 10, framesPerDirection: 6 },
      { kind: 'trigger-out-of-range', identifier: 'BBBBBBB', frame: 1, framesPerDirection: 0 },
    ]);
  });

  test('returns nothing for a clean list', () => {
    expect(collectDiagnostics([sampleRecord()])).toEqual([]);
  });
});

describe('formatDiagnostic', () => {
  test('formats a duplicate identifier', () => {
    expect(formatDiagnostic({ kind: 'duplicate-identifier', identifier: 'AAAAAAA' })).toBe(
      'Duplicate entry found: AAAAAAA',
    );
  });

  test('formats an unreachable trigger', () => {
    expect(
      formatDiagnostic({ kind: 'trigger-out-of-range', identifier: 'AAAAAAA', frame: 10, framesPerDirection: 6 }),
    ).toBe('Record AAAAAAA: trigger frame 10 may have no effect because it is not lower than framesPerDirection (6)');
  });
});
