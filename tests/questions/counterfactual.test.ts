import { describe, expect, it } from 'vitest';

import { createRandom } from '../../src/core/random.js';
import { buildShotIndex } from '../../src/shots/normalize.js';
import {
  findPositionCounterfactuals,
  findVelocityCounterfactuals,
  formatCoord,
} from '../../src/questions/counterfactual.js';

const index = buildShotIndex([
  { position: [0.1, 0.2, 0], velocity: [1, 0, 0] },
  { position: [0.1, 0.2, 0], velocity: [0, 1, 0] },
  { position: [0.3, 0.2, 0], velocity: [1, 0, 0] },
  { position: [0.1, 0.2, 0], velocity: [1, 0, 0] },
]);

describe('findVelocityCounterfactuals', () => {
  it('returns shots from the same position with another velocity', () => {
    const found = findVelocityCounterfactuals(
      [0.1, 0.2, 0],
      [1, 0, 0],
      index.byPosition,
      index.entries,
      3,
      createRandom(1)
    );
    expect(found).toEqual([1]);
  });

  it('works in the other direction', () => {
    const found = findVelocityCounterfactuals(
      [0.1, 0.2, 0],
      [0, 1, 0],
      index.byPosition,
      index.entries,
      3,
      createRandom(1)
    );
    expect([...found].sort((a, b) => a - b)).toEqual([0, 3]);
  });

  it('respects the limit', () => {
    const found = findVelocityCounterfactuals(
      [0.1, 0.2, 0],
      [0, 1, 0],
      index.byPosition,
      index.entries,
      1,
      createRandom(1)
    );
    expect(found).toHaveLength(1);
    expect([0, 3]).toContain(found[0]);
  });

  it('returns nothing for an unknown position', () => {
    expect(
      findVelocityCounterfactuals([9, 9, 0], [1, 0, 0], index.byPosition, index.entries, 3, createRandom(1))
    ).toEqual([]);
  });
});

describe('findPositionCounterfactuals', () => {
  it('returns shots with the same velocity from another position', () => {
    const found = findPositionCounterfactuals(
      [0.1, 0.2, 0],
      [1, 0, 0],
      index.byVelocity,
      index.entries,
      3,
      createRandom(1)
    );
    expect(found).toEqual([2]);
  });

  it('returns nothing when no other position shares the velocity', () => {
    expect(
      findPositionCounterfactuals([0.1, 0.2, 0], [0, 1, 0], index.byVelocity, index.entries, 3, createRandom(1))
    ).toEqual([]);
  });
});

describe('formatCoord', () => {
  it('prints near-zero values as 0.00', () => {
    expect(formatCoord([0.0001, -0.004])).toBe('(x=0.00, y=0.00)');
  });

  it('prefixes components and keeps two decimals', () => {
    expect(formatCoord([1.234, -2.5, 0], 'd')).toBe('(dx=1.23, dy=-2.50)');
  });
});
