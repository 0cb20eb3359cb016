import { describe, expect, it } from 'vitest';

import {
  buildShotIndex,
  extractWallHits,
  hasHitIndexAbove,
  lookupByPositionVelocity,
  normalizeShot,
  round2,
  roundVector,
  vectorKey,
} from '../../src/shots/normalize.js';

const shot = {
  video: 'shot_017.mp4',
  balls: {
    cue: {
      initial_position: [0.123, -0.456, 0],
      initial_velocity: ['1.5', 0, null],
      outcomes: { pocket: { color: 'orange', id: 'lc' }, wall_hits: 7 },
    },
  },
  cushion: { '3': 'red-green-wall', '7': 'grey-orange-wall' },
  events: [
    { type: 'linear_cushion', ball_id: 'cue', cushion_id: '3', frame: 40 },
    { type: 'ball_ball', ball_id: 'cue', frame: 20 },
    { type: 'circular_cushion', ball_id: 'cue', cushion_id: 7, frame: 10 },
    { type: 'linear_cushion', ball_id: 'one', cushion_id: '3', frame: 5 },
    { type: 'linear_cushion', ball_id: 'cue', cushion_id: '99', frame: 60 },
  ],
  metadata: { total_frames: 120 },
};

describe('rounding', () => {
  it('rounds to two decimals and collapses negative zero', () => {
    expect(round2(1.234)).toBe(1.23);
    expect(Object.is(round2(-0.001), 0)).toBe(true);
  });

  it('rounds exact ties to the even neighbour', () => {
    expect(round2(0.125)).toBe(0.12);
    expect(round2(0.375)).toBe(0.38);
    expect(round2(-0.125)).toBe(-0.12);
    expect(round2(1.125)).toBe(1.12);
    expect(roundVector([0.625, 0.875, 0])).toEqual([0.62, 0.88, 0]);
  });

  it('rounds non-ties to the nearest value', () => {
    expect(round2(0.135)).toBe(0.14);
    expect(round2(2.675)).toBe(2.67);
    expect(round2(-0.456)).toBe(-0.46);
  });

  it('coerces malformed components to zero', () => {
    expect(roundVector(['1.234', 'x', null])).toEqual([1.23, 0, 0]);
    expect(roundVector(undefined)).toEqual([0, 0, 0]);
  });

  it('builds fixed-width vector keys', () => {
    expect(vectorKey([1, -0.5, 0])).toBe('1.00,-0.50,0.00');
  });
});

describe('extractWallHits', () => {
  it('keeps cushion events of the reference ball in frame order', () => {
    expect(extractWallHits(shot)).toEqual([
      { type: 'wall', name: 'grey-orange-wall', frame: 10, index: 7 },
      { type: 'wall', name: 'red-green-wall', frame: 40, index: 3 },
      { type: 'wall', name: 'unknown', frame: 60, index: 99 },
    ]);
  });

  it('keeps the recorded order of hits on the same frame', () => {
    const record = {
      cushion: { '2': 'blue-purple-wall', '5': 'orange-red-wall', '9': 'green-blue-wall' },
      events: [
        { type: 'linear_cushion', ball_id: 'cue', cushion_id: '9', frame: 50 },
        { type: 'linear_cushion', ball_id: 'cue', cushion_id: '2', frame: 30 },
        { type: 'linear_cushion', ball_id: 'cue', cushion_id: '5', frame: 30 },
      ],
    };
    expect(extractWallHits(record).map((hit) => hit.name)).toEqual([
      'blue-purple-wall',
      'orange-red-wall',
      'green-blue-wall',
    ]);

    const swapped = { ...record, events: [record.events[0], record.events[2], record.events[1]] };
    expect(extractWallHits(swapped).map((hit) => hit.index)).toEqual([5, 2, 9]);
  });

  it('follows another reference ball', () => {
    expect(extractWallHits(shot, 'one').map((hit) => hit.frame)).toEqual([5]);
  });

  it('returns nothing for records without events', () => {
    expect(extractWallHits({})).toEqual([]);
    expect(extractWallHits('not a record')).toEqual([]);
  });

  it('flags cushion indices above a threshold', () => {
    expect(hasHitIndexAbove(shot, 18)).toBe(true);
    expect(hasHitIndexAbove(shot, 99)).toBe(false);
  });
});

describe('normalizeShot', () => {
  it('normalizes the per-ball layout', () => {
    const entry = normalizeShot(shot, 4);
    expect(entry.video).toBe('shot_017.mp4');
    expect(entry.initialState).toEqual({ position: [0.12, -0.46, 0], velocity: [1.5, 0, 0] });
    expect(entry.outcomes).toEqual({
      numWallHits: 3,
      wallHits: ['grey-orange-wall', 'red-green-wall', 'unknown'],
      pocketed: true,
      whichPocket: { color: 'orange', id: 'lc' },
      pocketColor: 'orange',
    });
    expect(entry.totalFrames).toBe(120);
  });

  it('falls back to the stored count for legacy records', () => {
    const entry = normalizeShot(
      { position: [1, 2, 0], velocity: [0, 0, 0], outcomes: { num_wall_hits: 2 } },
      5
    );
    expect(entry.video).toBe('shot_5');
    expect(entry.outcomes).toEqual({
      numWallHits: 2,
      wallHits: [],
      pocketed: false,
      whichPocket: null,
      pocketColor: null,
    });
    expect(entry.totalFrames).toBe(0);
  });

  it('treats a plain pocket value as its color', () => {
    const entry = normalizeShot({ outcomes: { pocket: 'red' } }, 0);
    expect(entry.outcomes.pocketed).toBe(true);
    expect(entry.outcomes.pocketColor).toBe('red');
    expect(entry.outcomes.whichPocket).toBe('red');
  });

  it('uses the shot id when there is no video name', () => {
    expect(normalizeShot({ metadata: { shot_id: 'abc' } }, 1).video).toBe('abc');
  });

  it('never throws on garbage', () => {
    const entry = normalizeShot(null, 2);
    expect(entry.video).toBe('shot_2');
    expect(entry.initialState).toEqual({ position: [0, 0, 0], velocity: [0, 0, 0] });
    expect(entry.outcomes.numWallHits).toBe(0);
    expect(entry.outcomes.pocketed).toBe(false);
  });
});

describe('buildShotIndex', () => {
  const records = [
    { position: [0.1, 0.2, 0], velocity: [1, 0, 0] },
    { position: [0.1, 0.2, 0], velocity: [0, 1, 0] },
    { position: [0.3, 0.2, 0], velocity: [1, 0, 0] },
    { position: [0.1, 0.2, 0], velocity: [1, 0, 0] },
  ];

  it('groups sim ids by position and by velocity', () => {
    const index = buildShotIndex(records);
    expect(index.entries.size).toBe(4);
    expect(index.byPosition.get('0.10,0.20,0.00')).toEqual([0, 1, 3]);
    expect(index.byVelocity.get('1.00,0.00,0.00')).toEqual([0, 2, 3]);
  });

  it('keeps the first sim id for a repeated pair', () => {
    const index = buildShotIndex(records);
    expect(lookupByPositionVelocity(index, [0.1, 0.2, 0], [1, 0, 0])).toBe(0);
    expect(lookupByPositionVelocity(index, [0.3, 0.2, 0], [0, 1, 0])).toBeUndefined();
  });
});
