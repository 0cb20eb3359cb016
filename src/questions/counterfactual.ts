import { sampleWithoutReplacement, type RandomSource } from '../core/random.js';
import { vectorKey } from '../shots/normalize.js';
import type { NormalizedEntry, Vec3 } from '../shots/types.js';

type Axis = 'position' | 'velocity';

function findCounterfactuals(
  shared: Axis,
  position: Vec3,
  velocity: Vec3,
  bucketsBySharedKey: ReadonlyMap<string, readonly number[]>,
  entries: ReadonlyMap<number, NormalizedEntry>,
  n: number,
  random: RandomSource
): number[] {
  const varying: Axis = shared === 'position' ? 'velocity' : 'position';
  const sharedValue = shared === 'position' ? position : velocity;
  const ownVaryingKey = vectorKey(varying === 'position' ? position : velocity);

  const bucket = bucketsBySharedKey.get(vectorKey(sharedValue)) ?? [];
  const candidates = bucket.filter((simId) => {
    const entry = entries.get(simId);
    return entry !== undefined && vectorKey(entry.initialState[varying]) !== ownVaryingKey;
  });
  if (candidates.length === 0) return [];
  return sampleWithoutReplacement(random, candidates, Math.min(n, candidates.length));
}

/**
 * Up to `n` shots from the same position launched with a different velocity.
 */
export function findVelocityCounterfactuals(
  position: Vec3,
  velocity: Vec3,
  byPosition: ReadonlyMap<string, readonly number[]>,
  entries: ReadonlyMap<number, NormalizedEntry>,
  n: number,
  random: RandomSource
): number[] {
  return findCounterfactuals('position', position, velocity, byPosition, entries, n, random);
}

/**
 * Up to `n` shots with the same velocity launched from a different position.
 */
export function findPositionCounterfactuals(
  position: Vec3,
  velocity: Vec3,
  byVelocity: ReadonlyMap<string, readonly number[]>,
  entries: ReadonlyMap<number, NormalizedEntry>,
  n: number,
  random: RandomSource
): number[] {
  return findCounterfactuals('velocity', position, velocity, byVelocity, entries, n, random);
}

function formatComponent(value: number): string {
  // Avoid printing "-0.00" for values that round to zero.
  return (Math.abs(value) >= 0.005 ? value : 0).toFixed(2);
}

/**
 * Planar coordinate for question text, e.g. `(dx=1.23, dy=-2.50)`.
 */
export function formatCoord(coord: readonly number[], prefix = ''): string {
  const [x = 0, y = 0] = coord;
  return `(${prefix}x=${formatComponent(x)}, ${prefix}y=${formatComponent(y)})`;
}
