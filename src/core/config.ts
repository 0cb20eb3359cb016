import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

import { z } from 'zod';
import yaml from 'yaml';

import { isLogLevel } from './logger.js';
import type { GenerationOptions } from '../questions/types.js';

const DEFAULT_CONFIG_FILE = 'billiards-qa.yaml';

const expandHome = (value: string): string => {
  if (value.startsWith('~/')) {
    return join(homedir(), value.slice(2));
  }
  return value;
};

const ConfigSchema = z.object({
  generation: z
    .object({
      numOptions: z.number().int().positive().default(4),
      numCorrect: z.number().int().positive().default(1),
      numDescriptivePerShot: z.number().int().nonnegative().default(1),
      numPredictivePerShot: z.number().int().nonnegative().default(1),
      maxVelocityCfsPerShot: z.number().int().nonnegative().default(3),
      maxPositionCfsPerShot: z.number().int().nonnegative().default(3),
      predictiveSplitFraction: z.number().min(0).max(1).default(0.5),
      // Off by default: distractors are drawn from the whole pool.
      filterInconsistentDistractors: z.boolean().default(false),
      seed: z.number().int().default(42),
    })
    .default({}),
  shots: z
    .object({
      referenceBall: z.string().min(1).default('cue'),
      excludeHitIndexAbove: z.number().int().optional(),
    })
    .default({}),
  table: z
    .object({
      width: z.number().positive().default(0.9906),
      height: z.number().positive().default(1.9812),
    })
    .default({}),
  paths: z
    .object({
      outputsDir: z.string().default('outputs'),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
});

export type BilliardsQaConfig = z.infer<typeof ConfigSchema>;

export function parseConfig(input: unknown): BilliardsQaConfig {
  return ConfigSchema.parse(input ?? {});
}

/**
 * Load config from YAML. A missing default file means "all defaults"; a missing
 * explicitly requested file is an error.
 */
export function loadConfig(configPath?: string): BilliardsQaConfig {
  const explicit = configPath ?? process.env.BILLIARDS_QA_CONFIG_PATH;
  const path = resolve(expandHome(explicit ?? DEFAULT_CONFIG_FILE));

  let parsed: unknown = {};
  if (explicit || existsSync(path)) {
    const raw = readFileSync(path, 'utf-8');
    parsed = yaml.parse(raw) ?? {};
  }

  const cfg = parseConfig(parsed);

  const envSeed = process.env.BILLIARDS_QA_SEED;
  if (envSeed) {
    const seed = Number(envSeed);
    if (Number.isInteger(seed)) {
      cfg.generation.seed = seed;
    }
  }

  const envLevel = process.env.BILLIARDS_QA_LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    cfg.logging.level = envLevel;
  }

  cfg.paths.outputsDir = expandHome(cfg.paths.outputsDir);
  return cfg;
}

export function toGenerationOptions(config: BilliardsQaConfig): GenerationOptions {
  const g = config.generation;
  return {
    numOptions: g.numOptions,
    numCorrect: g.numCorrect,
    numDescriptivePerShot: g.numDescriptivePerShot,
    numPredictivePerShot: g.numPredictivePerShot,
    maxVelocityCfsPerShot: g.maxVelocityCfsPerShot,
    maxPositionCfsPerShot: g.maxPositionCfsPerShot,
    predictiveSplitFraction: g.predictiveSplitFraction,
    filterInconsistentDistractors: g.filterInconsistentDistractors,
    table: { width: config.table.width, height: config.table.height },
  };
}
