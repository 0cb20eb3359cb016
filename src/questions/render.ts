import type { OptionFact, WallOrderKind } from './facts.js';
import type { Tense } from './tense.js';

const HIT_VERB: Record<Tense, string> = {
  base: 'hits',
  future: 'will hit',
  conditional: 'would hit',
};

const BE_POCKETED: Record<Tense, string> = {
  base: 'was pocketed',
  future: 'will be pocketed',
  conditional: 'would be pocketed',
};

const NOT_POCKETED: Record<Tense, string> = {
  base: 'was not pocketed',
  future: 'will not be pocketed',
  conditional: 'would not be pocketed',
};

const HIT_WAS: Record<Tense, string> = {
  base: 'hit was',
  future: 'hit will be',
  conditional: 'hit would be',
};

const ORDER_WORD: Record<WallOrderKind, string> = {
  first_wall_hit: 'first',
  second_wall_hit: 'second',
  third_wall_hit: 'third',
};

function hitsWalls(n: number, tense: Tense): string {
  const unit = n === 1 ? 'wall' : 'walls';
  return `The ball ${HIT_VERB[tense]} ${n} ${unit}`;
}

/**
 * Generic `kind(args...)` label for values outside the vocabulary, e.g. facts
 * read back from an older dataset.
 */
function fallbackLabel(fact: { kind: string }): string {
  const args = Object.entries(fact)
    .filter(([key]) => key !== 'kind')
    .map(([, value]) => String(value));
  return `${fact.kind}(${args.join(', ')})`;
}

export function renderFact(fact: OptionFact, tense: Tense): string {
  switch (fact.kind) {
    case 'pocketed':
      return `The ball ${BE_POCKETED[tense]}`;
    case 'pocketed_in':
      return `The ball ${BE_POCKETED[tense]} in the ${fact.color} pocket`;
    case 'not_pocketed':
      return `The ball ${NOT_POCKETED[tense]}`;
    case 'hits_0_walls':
      return hitsWalls(0, tense);
    case 'hits_1_wall':
      return hitsWalls(1, tense);
    case 'hits_n_diff_walls':
      return `The ball ${HIT_VERB[tense]} ${fact.count} different walls`;
    case 'hits_same_wall_n_times':
      return `The ball ${HIT_VERB[tense]} the same wall ${fact.count} times`;
    case 'first_wall_hit':
    case 'second_wall_hit':
    case 'third_wall_hit':
      return `The ${ORDER_WORD[fact.kind]} wall ${HIT_WAS[tense]} ${fact.wall}`;
    default:
      return fallbackLabel(fact);
  }
}

export type FactRenderer = (fact: OptionFact, tense: Tense) => string;
