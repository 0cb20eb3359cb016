/**
 * Command definitions for the billiards-qa CLI.
 */

import { join, resolve } from 'node:path';

import { Command, InvalidArgumentError } from 'commander';

import { VERSION } from '../index.js';
import { loadConfig, toGenerationOptions } from '../core/config.js';
import { Logger } from '../core/logger.js';
import { createRandom } from '../core/random.js';
import { loadShotRecords } from '../shots/loader.js';
import { buildShotIndex } from '../shots/normalize.js';
import { generateMcqDataset } from '../questions/generator.js';
import type { GenerationOptions, McqRecord, QuestionType } from '../questions/types.js';
import { writeJsonl } from '../dataset/jsonl.js';
import { formatValidationReport, validateQaFile } from '../dataset/validate.js';

/** Cushion ids above this do not exist on the simulated table. */
const MAX_VALID_HIT_INDEX = 18;

function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

function parsePositiveInt(value: string): number {
  const n = parseNonNegativeInt(value);
  if (n === 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError('Expected an integer.');
  }
  return n;
}

function parseFraction(value: string): number {
  const n = Number(value);
  if (Number.isNaN(n) || n < 0 || n > 1) {
    throw new InvalidArgumentError('Expected a number between 0 and 1.');
  }
  return n;
}

interface GenerateCliOptions {
  dataset?: string;
  input?: string;
  output?: string;
  config?: string;
  numOptions?: number;
  numCorrect?: number;
  numDescriptivePerShot?: number;
  numPredictivePerShot?: number;
  maxVelocityCfsPerShot?: number;
  maxPositionCfsPerShot?: number;
  predictiveFilterFraction?: number;
  seed?: number;
  excludeInvalidHits?: boolean;
  filterInconsistent?: boolean;
}

interface ValidateCliOptions {
  maxIssues: number;
}

function countByType(records: readonly McqRecord[]): Partial<Record<QuestionType, number>> {
  const counts: Partial<Record<QuestionType, number>> = {};
  for (const record of records) {
    const type = record.metadata.question_type;
    counts[type] = (counts[type] ?? 0) + 1;
  }
  return counts;
}

function runGenerate(options: GenerateCliOptions): void {
  const config = loadConfig(options.config);
  const logger = new Logger(config.logging.level);

  const datasetDir = options.dataset ? join(config.paths.outputsDir, options.dataset) : undefined;
  const inputDir = options.input ?? (datasetDir ? join(datasetDir, 'shots') : undefined);
  if (!inputDir) {
    throw new Error('Either --dataset or --input is required.');
  }
  const outputPath = resolve(
    options.output ?? (datasetDir ? join(datasetDir, 'raw_qa.jsonl') : 'raw_qa.jsonl')
  );

  const base = toGenerationOptions(config);
  const generation: GenerationOptions = {
    ...base,
    numOptions: options.numOptions ?? base.numOptions,
    numCorrect: options.numCorrect ?? base.numCorrect,
    numDescriptivePerShot: options.numDescriptivePerShot ?? base.numDescriptivePerShot,
    numPredictivePerShot: options.numPredictivePerShot ?? base.numPredictivePerShot,
    maxVelocityCfsPerShot: options.maxVelocityCfsPerShot ?? base.maxVelocityCfsPerShot,
    maxPositionCfsPerShot: options.maxPositionCfsPerShot ?? base.maxPositionCfsPerShot,
    predictiveSplitFraction: options.predictiveFilterFraction ?? base.predictiveSplitFraction,
    filterInconsistentDistractors: options.filterInconsistent ?? base.filterInconsistentDistractors,
  };
  const seed = options.seed ?? config.generation.seed;
  const referenceBall = config.shots.referenceBall;
  const excludeHitIndexAbove = options.excludeInvalidHits
    ? MAX_VALID_HIT_INDEX
    : config.shots.excludeHitIndexAbove;

  logger.info(`Loading shot summaries from ${inputDir}`);
  const loaded = loadShotRecords(inputDir, { referenceBall, excludeHitIndexAbove, logger });
  if (excludeHitIndexAbove !== undefined) {
    logger.info(`Excluded ${loaded.excludedCount} shot(s) with hit index > ${excludeHitIndexAbove}`);
  }
  if (loaded.unreadableCount > 0) {
    logger.warn(`Skipped ${loaded.unreadableCount} unreadable shot file(s)`);
  }
  logger.info(`Processing ${loaded.records.length} shot(s) with seed ${seed}`);

  const index = buildShotIndex(loaded.records, { referenceBall });
  const records = generateMcqDataset({ index, options: generation, random: createRandom(seed) });
  logger.info(`Question counts: ${JSON.stringify(countByType(records))}`);

  writeJsonl(outputPath, records);
  logger.info(`Wrote ${records.length} example(s) to ${outputPath}`);
}

function runValidate(path: string, options: ValidateCliOptions): void {
  const report = validateQaFile(path, options.maxIssues);
  console.log(formatValidationReport(report, resolve(path)));
  if (report.issues.length > 0) {
    process.exitCode = 1;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('billiards-qa')
    .description('Billiard shot outcome question generator')
    .version(VERSION);

  program
    .command('generate')
    .description('Generate an MCQ dataset (JSONL) from shot summary files')
    .option('-d, --dataset <name>', 'Dataset name (directory under the outputs dir)')
    .option('-i, --input <dir>', 'Directory tree of shot summary JSON files')
    .option('-o, --output <file>', 'Output JSONL path (default: <outputs>/<dataset>/raw_qa.jsonl)')
    .option('-C, --config <path>', 'Config file path')
    .option('-n, --num-options <n>', 'Total options per question', parsePositiveInt)
    .option('-c, --num-correct <n>', 'Correct options per question', parsePositiveInt)
    .option('-D, --num-descriptive-per-shot <n>', 'Descriptive questions per shot (0 disables)', parseNonNegativeInt)
    .option('-p, --num-predictive-per-shot <n>', 'Predictive questions per shot (0 disables)', parseNonNegativeInt)
    .option('-v, --max-velocity-cfs-per-shot <n>', 'Velocity counterfactuals per shot (0 disables)', parseNonNegativeInt)
    .option('-P, --max-position-cfs-per-shot <n>', 'Position counterfactuals per shot (0 disables)', parseNonNegativeInt)
    .option('-f, --predictive-filter-fraction <x>', 'Fraction of the video hidden from predictive answers', parseFraction)
    .option('-s, --seed <n>', 'Random seed', parseInteger)
    .option('-e, --exclude-invalid-hits', `Exclude shots with any hit index > ${MAX_VALID_HIT_INDEX}`)
    .option('--filter-inconsistent', 'Drop distractors that contradict a correct option')
    .action((options: GenerateCliOptions) => {
      runGenerate(options);
    });

  program
    .command('validate <file>')
    .description('Check a JSONL dataset for schema and tense consistency')
    .option('--max-issues <n>', 'Stop after this many issues', parsePositiveInt, 1000)
    .action((file: string, options: ValidateCliOptions) => {
      runValidate(file, options);
    });

  return program;
}
