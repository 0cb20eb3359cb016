import { sampleWithoutReplacement, shuffle, type RandomSource } from '../core/random.js';
import { factKey, isConsistentDistractor, type OptionFact } from './facts.js';
import { renderFact, type FactRenderer } from './render.js';
import type { Tense } from './tense.js';

export interface MultilabelSampleInput {
  trueFacts: readonly OptionFact[];
  poolFacts: readonly OptionFact[];
  /** Option slots in the question. */
  total: number;
  numCorrect: number;
  tense: Tense;
  random: RandomSource;
  renderer?: FactRenderer;
  /**
   * Also drop distractors that contradict a chosen true fact. Off by default,
   * in which case a distractor may negate a correct option.
   */
  filterInconsistent?: boolean;
}

export interface MultilabelSample {
  options: string[];
  groundTruth: number[];
}

/**
 * Mix `numCorrect` true facts with distractors from the pool, shuffle, and
 * render. An empty result means no question can be built.
 */
export function sampleMultilabelFromFacts(input: MultilabelSampleInput): MultilabelSample {
  const { poolFacts, total, tense, random } = input;
  const render = input.renderer ?? renderFact;
  const trueFacts: readonly OptionFact[] =
    input.trueFacts.length > 0 ? input.trueFacts : [{ kind: 'not_pocketed' }];

  const numCorrect = Math.min(input.numCorrect, trueFacts.length, total);
  if (numCorrect < 1) {
    return { options: [], groundTruth: [] };
  }

  const chosenTrue = sampleWithoutReplacement(random, trueFacts, numCorrect);
  const chosenKeys = new Set(chosenTrue.map(factKey));

  let candidates = poolFacts.filter((fact) => !chosenKeys.has(factKey(fact)));
  if (input.filterInconsistent) {
    candidates = candidates.filter((fact) => isConsistentDistractor(fact, chosenTrue));
  }
  const distractors = sampleWithoutReplacement(
    random,
    candidates,
    Math.min(total - numCorrect, candidates.length)
  );

  const labeled = [
    ...chosenTrue.map((fact) => ({ fact, correct: true })),
    ...distractors.map((fact) => ({ fact, correct: false })),
  ];

  // First occurrence wins, so a true fact is never displaced by a duplicate.
  const seen = new Set<string>();
  const deduped = labeled.filter(({ fact }) => {
    const key = factKey(fact);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  const shuffled = shuffle(random, deduped);
  const groundTruth: number[] = [];
  shuffled.forEach(({ correct }, i) => {
    if (correct) groundTruth.push(i);
  });
  if (groundTruth.length === 0) {
    return { options: [], groundTruth: [] };
  }

  return {
    options: shuffled.map(({ fact }) => render(fact, tense)),
    groundTruth,
  };
}
