import { Command } from 'commander';
import * as fs from 'node:fs';
import type { Logger } from 'pino';
import { match } from 'ts-pattern';
import { AnimDataFile } from '../animdata-file.ts';
import { formatDiagnostic } from '../integrity/diagnostics.ts';
import type { RecordOptions } from '../parser/structure/record.ts';
import {
  type CommandOptions,
  type CommanderFlags,
  TextFormat,
  parseCommandOptions,
  resolveFormat,
} from './command-options.ts';
import { createLogger } from './logger.ts';

export interface ProgramDependencies {
  /** Logger to use instead of the pretty-printing default */
  logger?: Logger;
}

/**
 * Create the CLI program.
 */
export function createProgram(dependencies: ProgramDependencies = {}): Command {
  const program = new Command();

  program
    .name('animdata')
    .description('Convert animation tables to and from tabbed text or JSON')
    .version('0.1.0');

  const compile = program
    .command('compile')
    .description('Compile tabbed text or JSON into an animation table')
    .argument('<source>', 'Tabbed text or JSON file to compile')
    .argument('<target>', 'Animation table file to write');

  const decompile = program
    .command('decompile')
    .description('Decompile an animation table into tabbed text or JSON')
    .argument('<source>', 'Animation table file to decompile')
    .argument('<target>', 'Tabbed text or JSON file to write');

  for (const command of [compile, decompile]) {
    command
      .option('--json', 'Use JSON as the text format', false)
      .option('--txt', 'Use tabbed text as the text format', false)
      .option('--sort', 'Sort the records by identifier before saving', false)
      .option('--strict-triggers', 'Reject trigger frames not lower than frames per direction', false)
      .option('--verbose', 'Verbose output', false);
  }

  compile.action(async (source: string, target: string, flags: CommanderFlags) => {
    const options = toCommandOptions(compile, source, target, flags);
    const logger = dependencies.logger ?? createLogger({ verbose: options.verbose });
    await runGuarded(() => runCompile(options, logger), logger);
  });

  decompile.action(async (source: string, target: string, flags: CommanderFlags) => {
    const options = toCommandOptions(decompile, source, target, flags);
    const logger = dependencies.logger ?? createLogger({ verbose: options.verbose });
    await runGuarded(() => runDecompile(options, logger), logger);
  });

  return program;
}

function toCommandOptions(command: Command, source: string, target: string, flags: CommanderFlags): CommandOptions {
  const format = resolveFormat(flags);
  if (format === null) {
    command.error('error: exactly one of --json or --txt is required');
  }
  return parseCommandOptions(source, target, format, flags);
}

/**
 * Run the CLI with user arguments (for programmatic use).
 */
export async function runAnimDataCommand(args: string[], dependencies: ProgramDependencies = {}): Promise<void> {
  const program = createProgram(dependencies);
  await program.parseAsync(args, { from: 'user' });
}

async function runGuarded(task: () => Promise<unknown>, logger: Logger): Promise<void> {
  try {
    await task();
  } catch (e) {
    logger.error({ err: e }, e instanceof Error ? e.message : String(e));
    process.exitCode = 1;
  }
}

function recordOptionsOf(options: CommandOptions): RecordOptions {
  return { strictTriggerFrames: options.strictTriggers };
}

function reportDiagnostics(file: AnimDataFile, logger: Logger): void {
  for (const diagnostic of file.diagnostics) {
    logger.warn(formatDiagnostic(diagnostic));
  }
}

/**
 * Compile tabbed text or JSON into an animation table.
 */
export async function runCompile(options: CommandOptions, logger: Logger): Promise<AnimDataFile> {
  logger.debug(`Reading ${options.format} records from ${options.source}`);
  const text = (await fs.promises.readFile(options.source, 'utf8')).replace(/^\uFEFF/, '');
  const recordOptions = recordOptionsOf(options);

  let file = match(options.format)
    .with(TextFormat.Json, () => AnimDataFile.fromJson(text, recordOptions))
    .with(TextFormat.Txt, () => AnimDataFile.fromTabbedText(text, recordOptions))
    .exhaustive();

  reportDiagnostics(file, logger);
  if (options.sort) {
    file = file.sorted();
  }

  await file.writeFile(options.target);
  logger.info(`Compiled ${file.records.length} records into ${options.target}`);
  return file;
}

/**
 * Decompile an animation table into tabbed text or JSON.
 */
export async function runDecompile(options: CommandOptions, logger: Logger): Promise<AnimDataFile> {
  logger.debug(`Reading animation table from ${options.source}`);
  let file = await AnimDataFile.fromFile(options.source, recordOptionsOf(options));

  reportDiagnostics(file, logger);
  if (options.sort) {
    file = file.sorted();
  }

  const output = match(options.format)
    .with(TextFormat.Json, () => file.toJson())
    .with(TextFormat.Txt, () => file.toTabbedText())
    .exhaustive();

  await fs.promises.writeFile(options.target, output);
  logger.info(`Decompiled ${file.records.length} records into ${options.target}`);
  return file;
}
