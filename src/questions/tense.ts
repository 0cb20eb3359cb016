/**
 * Grammatical mode an option is phrased in.
 * - base: descriptive, "The ball was pocketed"
 * - future: predictive, "The ball will be pocketed"
 * - conditional: counterfactual, "The ball would be pocketed"
 */
export type Tense = 'base' | 'future' | 'conditional';

export const TENSES: readonly Tense[] = ['base', 'future', 'conditional'];

export function parseTense(value: string | null | undefined): Tense {
  const normalized = (value ?? '').toLowerCase();
  if (normalized === 'future' || normalized === 'will') return 'future';
  if (normalized === 'conditional' || normalized === 'would') return 'conditional';
  return 'base';
}
