import type { RandomSource } from '../core/random.js';
import type { NormalizedEntry, ShotIndex, ShotOutcomes } from '../shots/types.js';
import {
  findPositionCounterfactuals,
  findVelocityCounterfactuals,
  formatCoord,
} from './counterfactual.js';
import { DISTRACTOR_POOL, factsFromOutcome, type OptionFact } from './facts.js';
import { sampleMultilabelFromFacts, type MultilabelSample } from './sampler.js';
import type { Tense } from './tense.js';
import {
  toWireInitialState,
  type GenerationOptions,
  type McqRecord,
  type TableDimensions,
} from './types.js';

export interface GenerateParams {
  index: ShotIndex;
  options: GenerationOptions;
  random: RandomSource;
  poolFacts?: readonly OptionFact[];
}

export const DESCRIPTIVE_QUESTION = 'What happened in this video?';
export const PREDICTIVE_QUESTION =
  'Based on the first part of the video, what will happen in STRICTLY the second part of the video?';

export function buildTableContext(table: TableDimensions): string {
  const w = table.width;
  const h = table.height;
  const m = Number((h / 2).toFixed(4));
  return (
    `The pool table has a width of ${w} and a height of ${h}. ` +
    'Pockets are marked by colored squares near them. Pocket locations: red at (0, 0), green at ' +
    `(${w}, 0), orange at (0, ${m}), blue at (${w}, ${m}), gray at (0, ${h}), and purple at (${w}, ${h}). ` +
    'Walls are named by the colors of the two pockets they connect ' +
    "(e.g., the 'red-green' wall is between the red and green pockets). " +
    'Answer the following question by considering the cue ball (white) movements on the pool table.'
  );
}

function withContext(context: string, question: string): string {
  return `Context: ${context}\nQuestion: ${question}`;
}

/**
 * Outcome restricted to wall hits at or after `fraction` of the video, so that
 * only the second part of the shot answers it.
 */
export function predictiveOutcome(entry: NormalizedEntry, fraction: number): ShotOutcomes {
  const threshold = entry.totalFrames > 0 ? fraction * entry.totalFrames : 0;
  const wallHits = entry.hitsDetail
    .filter((hit) => hit.type === 'wall' && hit.frame >= threshold)
    .map((hit) => hit.name);
  return { ...entry.outcomes, numWallHits: wallHits.length, wallHits };
}

export function partialVideoId(video: string): string {
  return video.endsWith('.mp4') ? `${video.slice(0, -4)}_partial.mp4` : `${video}_partial`;
}

function isUsable(sample: MultilabelSample): boolean {
  return sample.options.length > 0 && sample.groundTruth.length > 0;
}

export function generateMcqDataset(params: GenerateParams): McqRecord[] {
  const { index, options, random } = params;
  const poolFacts = params.poolFacts ?? DISTRACTOR_POOL;
  const context = buildTableContext(options.table);
  const out: McqRecord[] = [];

  const sample = (trueFacts: readonly OptionFact[], tense: Tense): MultilabelSample =>
    sampleMultilabelFromFacts({
      trueFacts,
      poolFacts,
      total: options.numOptions,
      numCorrect: options.numCorrect,
      tense,
      random,
      filterInconsistent: options.filterInconsistentDistractors,
    });

  const sequenced = (
    simId: number,
    type: 'descriptive' | 'predictive',
    video: string,
    question: string,
    trueFacts: readonly OptionFact[],
    count: number,
    tense: Tense
  ): void => {
    for (let q = 0; q < count; q++) {
      // A repeat needs more true facts than one question consumes.
      if (q > 0 && trueFacts.length <= options.numCorrect) break;
      const result = sample(trueFacts, tense);
      if (!isUsable(result)) continue;
      out.push({
        video,
        question: withContext(context, question),
        options: result.options,
        ground_truth: result.groundTruth,
        metadata: { question_type: type, sim_id: simId, question_index_within_shot: q },
      });
    }
  };

  for (const [simId, entry] of index.entries) {
    const { position, velocity } = entry.initialState;

    if (options.numDescriptivePerShot > 0) {
      sequenced(
        simId,
        'descriptive',
        entry.video,
        DESCRIPTIVE_QUESTION,
        factsFromOutcome(entry.outcomes),
        options.numDescriptivePerShot,
        'base'
      );
    }

    if (options.numPredictivePerShot > 0) {
      sequenced(
        simId,
        'predictive',
        partialVideoId(entry.video),
        PREDICTIVE_QUESTION,
        factsFromOutcome(predictiveOutcome(entry, options.predictiveSplitFraction)),
        options.numPredictivePerShot,
        'future'
      );
    }

    if (options.maxVelocityCfsPerShot > 0) {
      const partners = findVelocityCounterfactuals(
        position,
        velocity,
        index.byPosition,
        index.entries,
        options.maxVelocityCfsPerShot,
        random
      );
      for (const partnerId of partners) {
        const partner = index.entries.get(partnerId);
        if (!partner) continue;
        const result = sample(factsFromOutcome(partner.outcomes), 'conditional');
        if (!isUsable(result)) continue;
        const question =
          `If the initial velocity were changed from ${formatCoord(velocity, 'd')} ` +
          `to ${formatCoord(partner.initialState.velocity, 'd')} ` +
          '(assume all other variables are unchanged), what would happen?';
        out.push({
          video: entry.video,
          question: withContext(context, question),
          options: result.options,
          ground_truth: result.groundTruth,
          metadata: {
            question_type: 'counterfactual_velocity',
            sim_id: simId,
            counterfactual_sim_id: partnerId,
            counterfactual_video: partner.video,
            counterfactual_initial_state: toWireInitialState(partner.initialState),
          },
        });
      }
    }

    if (options.maxPositionCfsPerShot > 0) {
      const partners = findPositionCounterfactuals(
        position,
        velocity,
        index.byVelocity,
        index.entries,
        options.maxPositionCfsPerShot,
        random
      );
      for (const partnerId of partners) {
        const partner = index.entries.get(partnerId);
        if (!partner) continue;
        const result = sample(factsFromOutcome(partner.outcomes), 'conditional');
        if (!isUsable(result)) continue;
        const question =
          `If the initial ball position were changed from ${formatCoord(position)} ` +
          `to ${formatCoord(partner.initialState.position)} ` +
          '(assume all other variables are unchanged), what would happen?';
        out.push({
          video: entry.video,
          question: withContext(context, question),
          options: result.options,
          ground_truth: result.groundTruth,
          metadata: {
            question_type: 'counterfactual_position',
            sim_id: simId,
            counterfactual_sim_id: partnerId,
            counterfactual_video: partner.video,
            counterfactual_initial_state: toWireInitialState(partner.initialState),
          },
        });
      }
    }
  }

  return out;
}
