import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { readJsonlLines, toJsonl, writeJsonl } from '../../src/dataset/jsonl.js';

describe('jsonl', () => {
  it('writes one compact record per line', () => {
    const path = join(mkdtempSync(join(tmpdir(), 'billiards-qa-jsonl-')), 'nested', 'out.jsonl');
    writeJsonl(path, [{ a: 1 }, { b: [1, 2] }]);
    expect(readFileSync(path, 'utf-8')).toBe('{"a":1}\n{"b":[1,2]}\n');
  });

  it('writes nothing for no records', () => {
    expect(toJsonl([])).toBe('');
  });

  it('reads trimmed non-blank lines with their line numbers', () => {
    const path = join(mkdtempSync(join(tmpdir(), 'billiards-qa-jsonl-')), 'in.jsonl');
    writeFileSync(path, '{"a":1}\n\n  {"b":2}  \n', 'utf-8');
    expect(readJsonlLines(path)).toEqual([
      { line: 0, text: '{"a":1}' },
      { line: 2, text: '{"b":2}' },
    ]);
  });
});
