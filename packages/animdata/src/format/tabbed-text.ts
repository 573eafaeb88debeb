import { match, P } from 'ts-pattern';
import { TabbedTextException } from '../error/errors.ts';
import {
  type AnimationRecord,
  type RecordOptions,
  type RecordViolation,
  createRecord,
  describeViolation,
} from '../parser/structure/record.ts';
import { FRAME_MAX, type TriggerTuple, encodeFrames } from '../parser/structure/trigger.ts';

export const COF_NAME_COLUMN = 'CofName';
export const FRAMES_PER_DIRECTION_COLUMN = 'FramesPerDirection';
export const ANIMATION_SPEED_COLUMN = 'AnimationSpeed';

/**
 * Column holding the trigger code of a frame (FrameData000 ... FrameData143).
 */
export function frameDataColumn(frame: number): string {
  return `FrameData${String(frame).padStart(3, '0')}`;
}

export const TABBED_TEXT_COLUMNS: readonly string[] = [
  COF_NAME_COLUMN,
  FRAMES_PER_DIRECTION_COLUMN,
  ANIMATION_SPEED_COLUMN,
  ...Array.from({ length: FRAME_MAX }, (_, frame) => frameDataColumn(frame)),
];

const DELIMITER = '\t';
const LINE_TERMINATOR = '\r\n';
const QUOTE = '"';

/**
 * Serialize records as tab-separated rows, header first.
 */
export function dumpTabbedText(records: Iterable<AnimationRecord>): string {
  const rows: string[][] = [[...TABBED_TEXT_COLUMNS]];
  for (const record of records) {
    rows.push([
      record.identifier,
      String(record.framesPerDirection),
      String(record.speed),
      ...Array.from(encodeFrames(record.triggers), String),
    ]);
  }
  return rows.map((row) => row.map(quoteField).join(DELIMITER) + LINE_TERMINATOR).join('');
}

function quoteField(value: string): string {
  if (!/[\t"\r\n]/.test(value)) return value;
  return QUOTE + value.replaceAll(QUOTE, QUOTE + QUOTE) + QUOTE;
}

/**
 * Split text into rows of fields.
 * Quoted fields may hold delimiters, line breaks and doubled quotes. Blank lines are dropped.
 */
export function parseTabbedRows(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;
  let i = 0;

  const endRow = (): void => {
    row.push(field);
    if (row.length > 1 || row[0] !== '') {
      rows.push(row);
    }
    row = [];
    field = '';
  };

  while (i < text.length) {
    const char = text[i]!;

    if (quoted) {
      if (char === QUOTE) {
        if (text[i + 1] === QUOTE) {
          field += QUOTE;
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        field += char;
      }
      i++;
      continue;
    }

    if (char === QUOTE && field === '') {
      quoted = true;
    } else if (char === DELIMITER) {
      row.push(field);
      field = '';
    } else if (char === '\n') {
      endRow();
    } else if (char === '\r') {
      if (text[i + 1] !== '\n') endRow();
    } else {
      field += char;
    }
    i++;
  }

  if (quoted) {
    throw new TabbedTextException('Cannot parse tabbed text: unterminated quoted field', rows.length > 0 ? rows.length - 1 : undefined);
  }
  endRow();

  return rows;
}

/**
 * Load records from tabbed text.
 * Columns are looked up by header name; unknown columns are ignored.
 */
export function loadTabbedText(text: string, options: RecordOptions = {}): AnimationRecord[] {
  const [header, ...rows] = parseTabbedRows(text);
  if (header === undefined) return [];

  const columnIndex = (name: string): number => {
    const index = header.indexOf(name);
    if (index === -1) {
      throw new TabbedTextException('Missing column', undefined, undefined, name);
    }
    return index;
  };

  const cofNameIndex = columnIndex(COF_NAME_COLUMN);
  const framesPerDirectionIndex = columnIndex(FRAMES_PER_DIRECTION_COLUMN);
  const animationSpeedIndex = columnIndex(ANIMATION_SPEED_COLUMN);
  const frameDataIndices = Array.from({ length: FRAME_MAX }, (_, frame) => columnIndex(frameDataColumn(frame)));

  return rows.map((row, rowIndex) => {
    const cell = (column: number): string => {
      const value = row[column];
      if (value === undefined) {
        throw new TabbedTextException('Missing cell', rowIndex, column, header[column]);
      }
      return value;
    };

    const intCell = (column: number): number => {
      const value = cell(column).trim();
      if (!/^[+-]?\d+$/.test(value)) {
        throw new TabbedTextException('Cannot convert cell value to integer', rowIndex, column, header[column]);
      }
      return Number(value);
    };

    const triggers: TriggerTuple[] = [];
    frameDataIndices.forEach((column, frame) => {
      const code = intCell(column);
      if (code !== 0) triggers.push([frame, code]);
    });

    const result = createRecord(
      {
        identifier: cell(cofNameIndex),
        framesPerDirection: intCell(framesPerDirectionIndex),
        speed: intCell(animationSpeedIndex),
        triggers,
      },
      options,
    );

    if (!result.ok) {
      const column = violationColumn(result.error, {
        identifier: cofNameIndex,
        framesPerDirection: framesPerDirectionIndex,
        speed: animationSpeedIndex,
        frames: frameDataIndices,
      });
      throw new TabbedTextException(
        `Invalid record field: ${describeViolation(result.error)}`,
        rowIndex,
        column,
        column !== undefined ? header[column] : undefined,
      );
    }
    return result.value;
  });
}

interface ColumnLayout {
  identifier: number;
  framesPerDirection: number;
  speed: number;
  frames: readonly number[];
}

function violationColumn(violation: RecordViolation, layout: ColumnLayout): number | undefined {
  return match(violation)
    .with({ field: 'identifier' }, () => layout.identifier)
    .with({ field: 'framesPerDirection' }, () => layout.framesPerDirection)
    .with({ field: 'speed' }, () => layout.speed)
    .with({ field: 'triggers', frame: P.number }, ({ frame }) => layout.frames[frame])
    .exhaustive();
}
