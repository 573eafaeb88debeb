// Main exports
export { AnimDataFile } from './animdata-file.ts';

// Parser exports
export { decodeTable, encodeTable, groupByBucket, tableSize, BUCKET_HEADER_SIZE } from './parser/animdata.ts';
export { AnimDataReader } from './parser/animdata-reader.ts';
export { AnimDataWriter } from './parser/animdata-writer.ts';
export { hashIdentifier, BUCKET_COUNT } from './parser/structure/hash.ts';
export type { Result } from './parser/structure/result.ts';

// Record exports
export type { AnimationRecord, RecordInput, RecordOptions, RecordViolation } from './parser/structure/record.ts';
export {
  createRecord,
  recordFrom,
  describeViolation,
  readRecord,
  decodeRecord,
  writeRecord,
  encodeRecord,
  sortRecordsByIdentifier,
  IDENTIFIER_LENGTH,
  IDENTIFIER_FIELD_SIZE,
  DWORD_MAX,
  RECORD_SIZE,
} from './parser/structure/record.ts';
export type { Trigger, TriggerTuple, TriggerInput, TriggerViolation } from './parser/structure/trigger.ts';
export {
  createTrigger,
  createTriggers,
  encodeFrames,
  decodeFrames,
  FRAME_MAX,
  TRIGGER_CODE_MIN,
  TRIGGER_CODE_MAX,
} from './parser/structure/trigger.ts';

// Integrity exports
export type { Diagnostic } from './integrity/diagnostics.ts';
export {
  findDuplicateIdentifiers,
  findOutOfRangeTriggers,
  collectDiagnostics,
  formatDiagnostic,
} from './integrity/diagnostics.ts';

// Text format exports
export { dumpTabbedText, loadTabbedText, parseTabbedRows, frameDataColumn, TABBED_TEXT_COLUMNS } from './format/tabbed-text.ts';
export type { RecordJson } from './format/json.ts';
export { dumpJson, loadJson, recordToJson, recordFromJson } from './format/json.ts';

// Error exports
export {
  ErrorCategory,
  type ErrorCategoryValue,
  AnimDataException,
  ParserOutOfBoundException,
  ParserExtraDataException,
  ParserInvalidEncodingException,
  ParserInvalidDataException,
  ParserHashMismatchException,
  RecordValidationException,
  TabbedTextException,
  JsonFormatException,
} from './error/errors.ts';

// Console exports
export { createProgram, runAnimDataCommand, runCompile, runDecompile } from './console/animdata-command.ts';
export type { CommandOptions, TextFormatValue } from './console/command-options.ts';
export { TextFormat, DEFAULT_COMMAND_OPTIONS, resolveFormat } from './console/command-options.ts';
export { createLogger } from './console/logger.ts';
