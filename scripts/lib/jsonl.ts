/**
 * Line-delimited JSON files: one object per line.
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';

export interface RecordSink<T> {
  readonly path?: string;
  write(record: T): void;
  readonly count: number;
}

/**
 * Appends each record as soon as it is written, so an interrupted run keeps
 * everything processed so far. The file is created (empty) on construction.
 */
export class JsonlWriter<T> implements RecordSink<T> {
  private written = 0;

  constructor(readonly path: string) {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(path, '');
  }

  write(record: T): void {
    appendFileSync(this.path, JSON.stringify(record) + '\n');
    this.written++;
  }

  get count(): number {
    return this.written;
  }
}

export interface JsonlLine {
  lineNumber: number;
  value: unknown;
}

export type InvalidLineHandler = (lineNumber: number, detail: string) => void;

/**
 * Parse every non-blank line. A malformed line throws, unless `onInvalid` is
 * given, in which case it is reported there and skipped.
 */
export function readJsonl(filePath: string, onInvalid?: InvalidLineHandler): JsonlLine[] {
  const lines = readFileSync(filePath, 'utf-8').split('\n');
  const out: JsonlLine[] = [];
  lines.forEach((line, i) => {
    if (!line.trim()) return;
    try {
      out.push({ lineNumber: i + 1, value: JSON.parse(line) });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      if (!onInvalid) {
        throw new Error(`${filePath}:${i + 1}: invalid JSON (${detail})`);
      }
      onInvalid(i + 1, `invalid JSON (${detail})`);
    }
  });
  return out;
}

export function writeJsonl<T>(filePath: string, records: readonly T[]): void {
  const writer = new JsonlWriter<T>(filePath);
  for (const record of records) writer.write(record);
}

/** `<dir>/<prefix>_<partition>.jsonl` */
export function partitionPath(outputDir: string, prefix: string, partition: string): string {
  return join(outputDir, `${prefix}_${partition}.jsonl`);
}
