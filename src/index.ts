/**
 * billiards-qa
 *
 * Turns simulated billiard shot summaries into multiple-choice question
 * datasets (descriptive, predictive and counterfactual).
 *
 * @example
 * ```typescript
 * import { buildShotIndex, createRandom, generateMcqDataset, DEFAULT_GENERATION_OPTIONS } from 'billiards-qa';
 *
 * const index = buildShotIndex(records);
 * const questions = generateMcqDataset({
 *   index,
 *   options: DEFAULT_GENERATION_OPTIONS,
 *   random: createRandom(42),
 * });
 * ```
 */

export const VERSION = '0.1.0';

export { loadConfig, parseConfig, toGenerationOptions, type BilliardsQaConfig } from './core/config.js';
export { Logger, isLogLevel, type LogLevel } from './core/logger.js';
export {
  createRandom,
  sampleWithoutReplacement,
  shuffle,
  type RandomSource,
} from './core/random.js';

export * from './shots/types.js';
export {
  DEFAULT_REFERENCE_BALL,
  buildShotIndex,
  extractWallHits,
  hasHitIndexAbove,
  lookupByPositionVelocity,
  normalizeShot,
  round2,
  roundVector,
  vectorKey,
} from './shots/normalize.js';
export { listShotFiles, loadShotRecords, type LoadShotsOptions, type LoadShotsResult } from './shots/loader.js';

export * from './questions/types.js';
export * from './questions/facts.js';
export { TENSES, parseTense, type Tense } from './questions/tense.js';
export { renderFact, type FactRenderer } from './questions/render.js';
export {
  sampleMultilabelFromFacts,
  type MultilabelSample,
  type MultilabelSampleInput,
} from './questions/sampler.js';
export {
  findPositionCounterfactuals,
  findVelocityCounterfactuals,
  formatCoord,
} from './questions/counterfactual.js';
export {
  DESCRIPTIVE_QUESTION,
  PREDICTIVE_QUESTION,
  buildTableContext,
  generateMcqDataset,
  partialVideoId,
  predictiveOutcome,
  type GenerateParams,
} from './questions/generator.js';

export { readJsonlLines, toJsonl, writeJsonl, type JsonlLine } from './dataset/jsonl.js';
export {
  detectTense,
  formatValidationReport,
  validateQaFile,
  validateQaLines,
  validateQuestionIndices,
  validateRecordSchema,
  validateTenseConsistency,
  type ValidationReport,
} from './dataset/validate.js';
