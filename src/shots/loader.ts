import { readdirSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';

import type { Logger } from '../core/logger.js';
import { DEFAULT_REFERENCE_BALL, hasHitIndexAbove } from './normalize.js';
import type { RawShotRecord } from './types.js';

export interface LoadShotsOptions {
  referenceBall?: string;
  /** Drop shots with any wall-hit cushion index above this value. */
  excludeHitIndexAbove?: number;
  logger?: Logger;
}

export interface LoadShotsResult {
  records: RawShotRecord[];
  files: string[];
  excludedCount: number;
  unreadableCount: number;
}

/**
 * All `*.json` files below `root`, sorted so that sim ids are stable across runs.
 */
export function listShotFiles(root: string): string[] {
  return readdirSync(root, { encoding: 'utf-8', recursive: true })
    .filter((relative) => relative.endsWith('.json'))
    .map((relative) => join(root, relative))
    .filter((file) => statSync(file).isFile())
    .sort();
}

export function loadShotRecords(root: string, options: LoadShotsOptions = {}): LoadShotsResult {
  const referenceBall = options.referenceBall ?? DEFAULT_REFERENCE_BALL;
  const files = listShotFiles(root);
  const records: RawShotRecord[] = [];
  const kept: string[] = [];
  let excludedCount = 0;
  let unreadableCount = 0;

  for (const file of files) {
    let record: unknown;
    try {
      record = JSON.parse(readFileSync(file, 'utf-8'));
    } catch (error) {
      unreadableCount += 1;
      options.logger?.warn(`Skipping unreadable shot file ${file}`, error);
      continue;
    }

    if (
      options.excludeHitIndexAbove !== undefined &&
      hasHitIndexAbove(record, options.excludeHitIndexAbove, referenceBall)
    ) {
      excludedCount += 1;
      options.logger?.debug(`Excluding ${file}: hit index above ${options.excludeHitIndexAbove}`);
      continue;
    }

    records.push(record);
    kept.push(file);
  }

  return { records, files: kept, excludedCount, unreadableCount };
}
