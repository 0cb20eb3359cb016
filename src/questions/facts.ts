/**
 * Closed vocabulary of facts about one ball's outcome in a shot.
 *
 * Each fact is a predicate plus the arguments it needs. Facts compare by value
 * through `factKey`; two facts with the same key are the same fact.
 *
 * | kind                   | args          | meaning                                  |
 * |------------------------|---------------|------------------------------------------|
 * | pocketed               |               | ball ends in some pocket                 |
 * | pocketed_in            | color         | ball ends in the named pocket            |
 * | not_pocketed           |               | ball is never pocketed                   |
 * | hits_0_walls           |               | no wall contact                          |
 * | hits_1_wall            |               | exactly one wall contact                 |
 * | hits_n_diff_walls      | count (>= 2)  | that many distinct walls in the sequence |
 * | hits_same_wall_n_times | count (>= 2)  | every contact is with one wall           |
 * | first/second/third_wall_hit | wall     | wall at that position in the sequence    |
 */

import type { ShotOutcomes } from '../shots/types.js';

export const POCKET_COLORS = ['gray', 'purple', 'blue', 'orange', 'green', 'red'] as const;

export const WALL_NAMES = [
  'green-blue-wall',
  'orange-red-wall',
  'grey-orange-wall',
  'purple-grey-wall',
  'blue-purple-wall',
  'red-green-wall',
] as const;

export const WALL_ORDER_KINDS = ['first_wall_hit', 'second_wall_hit', 'third_wall_hit'] as const;

export type WallOrderKind = (typeof WALL_ORDER_KINDS)[number];

export type OptionFact =
  | { kind: 'pocketed' }
  | { kind: 'pocketed_in'; color: string }
  | { kind: 'not_pocketed' }
  | { kind: 'hits_0_walls' }
  | { kind: 'hits_1_wall' }
  | { kind: 'hits_n_diff_walls'; count: number }
  | { kind: 'hits_same_wall_n_times'; count: number }
  | { kind: WallOrderKind; wall: string };

export type OptionFactKind = OptionFact['kind'];

export type FactArg = string | number;

export function factArgs(fact: OptionFact): FactArg[] {
  switch (fact.kind) {
    case 'pocketed':
    case 'not_pocketed':
    case 'hits_0_walls':
    case 'hits_1_wall':
      return [];
    case 'pocketed_in':
      return [fact.color];
    case 'hits_n_diff_walls':
    case 'hits_same_wall_n_times':
      return [fact.count];
    case 'first_wall_hit':
    case 'second_wall_hit':
    case 'third_wall_hit':
      return [fact.wall];
    default: {
      const unreachable: never = fact;
      return unreachable;
    }
  }
}

/**
 * Value identity of a fact, e.g. `pocketed_in(orange)`.
 */
export function factKey(fact: OptionFact): string {
  return `${fact.kind}(${factArgs(fact).join(', ')})`;
}

export function uniqueFacts(facts: readonly OptionFact[]): OptionFact[] {
  const seen = new Set<string>();
  const out: OptionFact[] = [];
  for (const fact of facts) {
    const key = factKey(fact);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(fact);
  }
  return out;
}

export type OutcomeFactsInput = Pick<
  ShotOutcomes,
  'numWallHits' | 'wallHits' | 'pocketed' | 'pocketColor'
>;

/**
 * Facts true of a normalized outcome, in a fixed order: one pocket fact
 * (plus the pocket color when known), one wall-count fact, then up to three
 * wall-order facts.
 */
export function factsFromOutcome(outcomes: OutcomeFactsInput): OptionFact[] {
  const facts: OptionFact[] = [];
  const hits = Math.max(0, Math.trunc(outcomes.numWallHits || 0));
  const wallHits = outcomes.wallHits ?? [];

  if (outcomes.pocketed) {
    facts.push({ kind: 'pocketed' });
    if (outcomes.pocketColor) {
      facts.push({ kind: 'pocketed_in', color: outcomes.pocketColor });
    }
  } else {
    facts.push({ kind: 'not_pocketed' });
  }

  if (hits === 0) {
    facts.push({ kind: 'hits_0_walls' });
  } else if (hits === 1) {
    facts.push({ kind: 'hits_1_wall' });
  } else {
    const distinct = new Set(wallHits).size;
    if (wallHits.length === hits && distinct === 1) {
      facts.push({ kind: 'hits_same_wall_n_times', count: hits });
    } else {
      // Distinct names in the observed sequence; with no usable sequence
      // (legacy count only) the hit count stands in.
      facts.push({ kind: 'hits_n_diff_walls', count: distinct >= 2 ? distinct : hits });
    }
  }

  WALL_ORDER_KINDS.forEach((kind, i) => {
    const wall = wallHits[i];
    if (wall !== undefined) {
      facts.push({ kind, wall });
    }
  });

  return uniqueFacts(facts);
}

function buildDistractorPool(): OptionFact[] {
  const pool: OptionFact[] = [{ kind: 'pocketed' }];
  for (const color of POCKET_COLORS) {
    pool.push({ kind: 'pocketed_in', color });
  }
  pool.push({ kind: 'not_pocketed' }, { kind: 'hits_0_walls' }, { kind: 'hits_1_wall' });
  for (const count of [2, 3]) {
    pool.push({ kind: 'hits_n_diff_walls', count });
  }
  for (const count of [2, 3]) {
    pool.push({ kind: 'hits_same_wall_n_times', count });
  }
  for (const kind of WALL_ORDER_KINDS) {
    for (const wall of WALL_NAMES) {
      pool.push({ kind, wall });
    }
  }
  return pool;
}

/**
 * Every fact over the known pocket colors, wall names and small counts,
 * regardless of truth.
 */
export const DISTRACTOR_POOL: readonly OptionFact[] = buildDistractorPool();

function describesPocketed(fact: OptionFact): boolean {
  return fact.kind === 'pocketed' || fact.kind === 'pocketed_in';
}

function describesPositiveWallHits(fact: OptionFact): boolean {
  switch (fact.kind) {
    case 'hits_1_wall':
    case 'hits_n_diff_walls':
    case 'hits_same_wall_n_times':
    case 'first_wall_hit':
    case 'second_wall_hit':
    case 'third_wall_hit':
      return true;
    default:
      return false;
  }
}

/**
 * Whether `candidate` can stand beside the chosen true facts without
 * contradicting one of them.
 */
export function isConsistentDistractor(
  candidate: OptionFact,
  chosenTrue: readonly OptionFact[]
): boolean {
  for (const fact of chosenTrue) {
    if (describesPocketed(fact) && candidate.kind === 'not_pocketed') return false;
    if (fact.kind === 'not_pocketed' && describesPocketed(candidate)) return false;
    if (fact.kind === 'hits_0_walls' && describesPositiveWallHits(candidate)) return false;
    if (candidate.kind === 'hits_0_walls' && describesPositiveWallHits(fact)) return false;
  }
  return true;
}
