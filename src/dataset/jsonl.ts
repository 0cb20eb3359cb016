import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

export function toJsonl(records: readonly unknown[]): string {
  return records.map((record) => `${JSON.stringify(record)}\n`).join('');
}

export function writeJsonl(path: string, records: readonly unknown[]): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, toJsonl(records), 'utf-8');
}

export interface JsonlLine {
  /** 0-based line number in the file. */
  line: number;
  text: string;
}

/**
 * Non-blank lines, trimmed, with their original line numbers.
 */
export function readJsonlLines(path: string): JsonlLine[] {
  return readFileSync(path, 'utf-8')
    .split('\n')
    .map((text, line) => ({ line, text: text.trim() }))
    .filter(({ text }) => text.length > 0);
}
