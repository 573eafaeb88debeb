/**
 * Supported text formats.
 */
export const TextFormat = {
  Json: 'json',
  Txt: 'txt',
} as const;

export type TextFormatValue = (typeof TextFormat)[keyof typeof TextFormat];

/**
 * Parsed options shared by compile and decompile.
 */
export interface CommandOptions {
  /** File to read */
  source: string;
  /** File to write */
  target: string;
  /** Text side of the conversion */
  format: TextFormatValue;
  /** Order records by identifier before writing */
  sort: boolean;
  /** Reject trigger frames at or past framesPerDirection */
  strictTriggers: boolean;
  /** Debug logging */
  verbose: boolean;
}

/**
 * Default options.
 */
export const DEFAULT_COMMAND_OPTIONS: Omit<CommandOptions, 'source' | 'target' | 'format'> = {
  sort: false,
  strictTriggers: false,
  verbose: false,
};

/**
 * Flags as commander hands them over.
 */
export interface CommanderFlags {
  json?: boolean;
  txt?: boolean;
  sort?: boolean;
  strictTriggers?: boolean;
  verbose?: boolean;
}

/**
 * Pick the text format from the --json / --txt flags.
 * Returns null unless exactly one of them is set.
 */
export function resolveFormat(flags: CommanderFlags): TextFormatValue | null {
  if (flags.json && !flags.txt) return TextFormat.Json;
  if (flags.txt && !flags.json) return TextFormat.Txt;
  return null;
}

/**
 * Parse commander flags into CommandOptions.
 */
export function parseCommandOptions(
  source: string,
  target: string,
  format: TextFormatValue,
  flags: CommanderFlags,
): CommandOptions {
  return {
    source,
    target,
    format,
    sort: flags.sort ?? DEFAULT_COMMAND_OPTIONS.sort,
    strictTriggers: flags.strictTriggers ?? DEFAULT_COMMAND_OPTIONS.strictTriggers,
    verbose: flags.verbose ?? DEFAULT_COMMAND_OPTIONS.verbose,
  };
}
