import * as fs from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { decodeTable, encodeTable, groupByBucket } from './parser/animdata.ts';
import { hashIdentifier } from './parser/structure/hash.ts';
import { type AnimationRecord, type RecordOptions, sortRecordsByIdentifier } from './parser/structure/record.ts';
import { type Diagnostic, collectDiagnostics } from './integrity/diagnostics.ts';
import { dumpTabbedText, loadTabbedText } from './format/tabbed-text.ts';
import { dumpJson, loadJson } from './format/json.ts';

/**
 * High-level animation table access.
 */
export class AnimDataFile {
  private readonly _records: readonly AnimationRecord[];
  private readonly options: RecordOptions;
  private cachedBuckets?: readonly AnimationRecord[][];
  private cachedDiagnostics?: readonly Diagnostic[];

  constructor(records: readonly AnimationRecord[], options: RecordOptions = {}) {
    this._records = Object.freeze([...records]);
    this.options = options;
  }

  /**
   * Get all records, in table order.
   */
  get records(): readonly AnimationRecord[] {
    return this._records;
  }

  /**
   * Duplicate identifiers and unreachable trigger frames.
   */
  get diagnostics(): readonly Diagnostic[] {
    if (this.cachedDiagnostics) return this.cachedDiagnostics;
    this.cachedDiagnostics = collectDiagnostics(this._records);
    return this.cachedDiagnostics;
  }

  /**
   * Get the first record with the given identifier.
   */
  find(identifier: string): AnimationRecord | undefined {
    this.cachedBuckets ??= groupByBucket(this._records);
    return this.cachedBuckets[hashIdentifier(identifier)]?.find((record) => record.identifier === identifier);
  }

  /**
   * Copy of this file with records ordered by identifier.
   */
  sorted(): AnimDataFile {
    return new AnimDataFile(sortRecordsByIdentifier(this._records), this.options);
  }

  toBuffer(): Uint8Array {
    return encodeTable(this._records, this.options);
  }

  toTabbedText(): string {
    return dumpTabbedText(this._records);
  }

  toJson(): string {
    return dumpJson(this._records);
  }

  /**
   * Write the binary table to a file.
   */
  async writeFile(path: string): Promise<void> {
    await writeFile(path, this.toBuffer());
  }

  /**
   * Parse an animation table from buffer.
   */
  static fromBuffer(data: Uint8Array | ArrayBuffer, options: RecordOptions = {}): AnimDataFile {
    return new AnimDataFile(decodeTable(data, options), options);
  }

  /**
   * Parse an animation table from file.
   */
  static async fromFile(path: string, options: RecordOptions = {}): Promise<AnimDataFile> {
    return AnimDataFile.fromBuffer(await readFile(path), options);
  }

  /**
   * Synchronously parse an animation table from file.
   */
  static fromFileSync(path: string, options: RecordOptions = {}): AnimDataFile {
    return AnimDataFile.fromBuffer(fs.readFileSync(path), options);
  }

  static fromTabbedText(text: string, options: RecordOptions = {}): AnimDataFile {
    return new AnimDataFile(loadTabbedText(text, options), options);
  }

  static fromJson(text: string, options: RecordOptions = {}): AnimDataFile {
    return new AnimDataFile(loadJson(text, options), options);
  }
}
