import { afterEach, beforeEach, describe, test, expect } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import pino, { type Logger } from 'pino';
import { AnimDataFile } from '../src/animdata-file.ts';
import { TextFormat, parseCommandOptions, resolveFormat } from '../src/console/command-options.ts';
import { createProgram, runAnimDataCommand, runCompile, runDecompile } from '../src/console/animdata-command.ts';
import { createLogger } from '../src/console/logger.ts';
import { dumpJson } from '../src/format/json.ts';
import { dumpTabbedText } from '../src/format/tabbed-text.ts';
import { encodeTable } from '../src/parser/animdata.ts';
import { sampleRecord } from './helpers.ts';

interface LogLine {
  level: number;
  msg: string;
}

function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(message: string) {
        lines.push(JSON.parse(message));
      },
    },
  );
  return { logger, lines };
}

const WARN = 40;
const INFO = 30;

describe('command options', () => {
  test('requires exactly one text format', () => {
    expect(resolveFormat({ json: true })).toBe(TextFormat.Json);
    expect(resolveFormat({ txt: true, json: false })).toBe(TextFormat.Txt);
    expect(resolveFormat({})).toBeNull();
    expect(resolveFormat({ json: true, txt: true })).toBeNull();
  });

  test('fills in defaults', () => {
    expect(parseCommandOptions('in', 'out', TextFormat.Json, { sort: true })).toEqual({
      source: 'in',
      target: 'out',
      format: 'json',
      sort: true,
      strictTriggers: false,
      verbose: false,
    });
  });
});

describe('createLogger', () => {
  test('logs debug messages when verbose', () => {
    expect(createLogger({ verbose: true, pretty: false }).level).toBe('debug');
    expect(createLogger({ pretty: false }).level).toBe('info');
  });
});

describe('createProgram', () => {
  test('registers compile and decompile', () => {
    expect(createProgram().commands.map((command) => command.name())).toEqual(['compile', 'decompile']);
  });
});

describe('commands', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'animdata-command-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  const bravo = sampleRecord({ identifier: 'BBBBBBB' });
  const alpha = sampleRecord();
  const records = [bravo, alpha];

  test('compiles JSON into a table', async () => {
    const source = path.join(dir, 'animdata.json');
    const target = path.join(dir, 'animdata.d2');
    fs.writeFileSync(source, dumpJson(records));
    const { logger, lines } = captureLogger();

    const file = await runCompile(parseCommandOptions(source, target, TextFormat.Json, {}), logger);

    expect(file.records).toEqual(records);
    expect(fs.readFileSync(target)).toEqual(Buffer.from(encodeTable(records)));
    expect(lines.at(-1)).toMatchObject({ level: INFO, msg: `Compiled 2 records into ${target}` });
  });

  test('compiles tabbed text with a byte order mark, sorted', async () => {
    const source = path.join(dir, 'animdata.txt');
    const target = path.join(dir, 'animdata.d2');
    fs.writeFileSync(source, '\uFEFF' + dumpTabbedText(records));
    const { logger } = captureLogger();

    const file = await runCompile(parseCommandOptions(source, target, TextFormat.Txt, { sort: true }), logger);

    expect(file.records.map((record) => record.identifier)).toEqual(['AAAAAAA', 'BBBBBBB']);
    expect(AnimDataFile.fromFileSync(target).records).toHaveLength(2);
  });

  test('warns about duplicates while compiling', async () => {
    const source = path.join(dir, 'animdata.json');
    const target = path.join(dir, 'animdata.d2');
    fs.writeFileSync(source, dumpJson([...records, sampleRecord({ speed: 3 })]));
    const { logger, lines } = captureLogger();

    await runCompile(parseCommandOptions(source, target, TextFormat.Json, {}), logger);

    expect(lines.filter((line) => line.level === WARN).map((line) => line.msg)).toEqual([
      'Duplicate entry found: AAAAAAA',
    ]);
    expect(AnimDataFile.fromFileSync(target).records).toHaveLength(3);
  });

  test('decompiles a table into tabbed text', async () => {
    const source = path.join(dir, 'animdata.d2');
    const target = path.join(dir, 'animdata.txt');
    fs.writeFileSync(source, encodeTable(records));
    const { logger, lines } = captureLogger();

    await runDecompile(parseCommandOptions(source, target, TextFormat.Txt, {}), logger);

    expect(fs.readFileSync(target, 'utf8')).toBe(dumpTabbedText([alpha, bravo]));
    expect(lines.at(-1)).toMatchObject({ level: INFO, msg: `Decompiled 2 records into ${target}` });
  });

  test('runs decompile from arguments', async () => {
    const source = path.join(dir, 'animdata.d2');
    const target = path.join(dir, 'animdata.json');
    fs.writeFileSync(source, encodeTable(records));
    const { logger } = captureLogger();

    await runAnimDataCommand(['decompile', source, target, '--json', '--sort'], { logger });

    expect(fs.readFileSync(target, 'utf8')).toBe(dumpJson([alpha, bravo]));
    expect(process.exitCode ?? 0).toBe(0);
  });

  test('compiles then decompiles back to the sorted source text', async () => {
    const source = path.join(dir, 'source.txt');
    const table = path.join(dir, 'animdata.d2');
    const target = path.join(dir, 'target.txt');
    fs.writeFileSync(source, dumpTabbedText(records));
    const { logger } = captureLogger();

    await runAnimDataCommand(['compile', source, table, '--txt'], { logger });
    await runAnimDataCommand(['decompile', table, target, '--txt', '--sort'], { logger });

    expect(fs.readFileSync(target, 'utf8')).toBe(dumpTabbedText([alpha, bravo]));
    expect(process.exitCode ?? 0).toBe(0);
  });

  test('logs the error and sets the exit code for a corrupt table', async () => {
    const source = path.join(dir, 'animdata.d2');
    const target = path.join(dir, 'animdata.json');
    fs.writeFileSync(source, new Uint8Array(1025));
    const { logger, lines } = captureLogger();

    await runAnimDataCommand(['decompile', source, target, '--json'], { logger });

    expect(process.exitCode).toBe(1);
    expect(lines.at(-1)).toMatchObject({
      msg: 'Data size mismatch: buckets use 1024 bytes, but binary size is 1025 bytes',
    });
    expect(fs.existsSync(target)).toBe(false);
  });

  test('rejects trigger frames past the frame count in strict mode', async () => {
    const source = path.join(dir, 'animdata.json');
    const target = path.join(dir, 'animdata.d2');
    fs.writeFileSync(source, dumpJson([sampleRecord({ framesPerDirection: 6 })]));
    const { logger, lines } = captureLogger();

    await runAnimDataCommand(['compile', source, target, '--json', '--strict-triggers'], { logger });

    expect(process.exitCode).toBe(1);
    expect(lines.at(-1)?.level).toBe(50);
    expect(fs.existsSync(target)).toBe(false);
  });
});
