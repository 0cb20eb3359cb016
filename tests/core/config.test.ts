import { mkdtempSync, writeFileSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { loadConfig, parseConfig, toGenerationOptions } from '../../src/core/config.js';
import { DEFAULT_GENERATION_OPTIONS } from '../../src/questions/types.js';

describe('parseConfig', () => {
  it('fills every section with defaults', () => {
    const config = parseConfig({});
    expect(config.generation.numOptions).toBe(4);
    expect(config.generation.seed).toBe(42);
    expect(config.generation.filterInconsistentDistractors).toBe(false);
    expect(config.shots.referenceBall).toBe('cue');
    expect(config.shots.excludeHitIndexAbove).toBeUndefined();
    expect(config.paths.outputsDir).toBe('outputs');
    expect(config.logging.level).toBe('info');
  });

  it('maps defaults onto the generation options', () => {
    expect(toGenerationOptions(parseConfig(undefined))).toEqual(DEFAULT_GENERATION_OPTIONS);
  });

  it('rejects out-of-range values', () => {
    expect(() => parseConfig({ generation: { numOptions: 0 } })).toThrow();
    expect(() => parseConfig({ generation: { predictiveSplitFraction: 1.5 } })).toThrow();
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'billiards-qa-config-'));
    vi.stubEnv('BILLIARDS_QA_SEED', '');
    vi.stubEnv('BILLIARDS_QA_LOG_LEVEL', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  const writeConfig = (body: string): string => {
    const path = join(dir, 'billiards-qa.yaml');
    writeFileSync(path, body, 'utf-8');
    return path;
  };

  it('reads YAML and keeps defaults for missing keys', () => {
    const path = writeConfig(
      ['generation:', '  numOptions: 5', '  seed: 3', 'paths:', '  outputsDir: ~/qa-out', ''].join('\n')
    );
    const config = loadConfig(path);
    expect(config.generation.numOptions).toBe(5);
    expect(config.generation.numCorrect).toBe(1);
    expect(config.generation.seed).toBe(3);
    expect(config.paths.outputsDir).toBe(join(homedir(), 'qa-out'));
  });

  it('treats an empty file as all defaults', () => {
    const config = loadConfig(writeConfig(''));
    expect(config.generation.numOptions).toBe(4);
  });

  it('applies environment overrides', () => {
    const path = writeConfig('generation:\n  seed: 3\nlogging:\n  level: warn\n');
    vi.stubEnv('BILLIARDS_QA_SEED', '7');
    vi.stubEnv('BILLIARDS_QA_LOG_LEVEL', 'DEBUG');
    const config = loadConfig(path);
    expect(config.generation.seed).toBe(7);
    expect(config.logging.level).toBe('debug');
  });

  it('ignores an unknown log level in the environment', () => {
    const path = writeConfig('logging:\n  level: warn\n');
    vi.stubEnv('BILLIARDS_QA_LOG_LEVEL', 'loud');
    expect(loadConfig(path).logging.level).toBe('warn');
  });

  it('reads the path from BILLIARDS_QA_CONFIG_PATH', () => {
    const path = writeConfig('generation:\n  numCorrect: 2\n');
    vi.stubEnv('BILLIARDS_QA_CONFIG_PATH', path);
    expect(loadConfig().generation.numCorrect).toBe(2);
  });

  it('fails when an explicit file is missing', () => {
    expect(() => loadConfig(join(dir, 'missing.yaml'))).toThrow();
  });
});
