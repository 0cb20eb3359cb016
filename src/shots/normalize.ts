import type {
  JsonValue,
  NormalizedEntry,
  NormalizeOptions,
  RawShotRecord,
  ShotIndex,
  ShotOutcomes,
  Vec3,
  WallHit,
} from './types.js';

export const DEFAULT_REFERENCE_BALL = 'cue';

const WALL_EVENT_TYPES = new Set(['linear_cushion', 'circular_cushion']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function toInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return null;
}

function toJsonValue(value: unknown): JsonValue | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) return value.map((item) => toJsonValue(item));
  if (isRecord(value)) {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = toJsonValue(item);
    }
    return out;
  }
  return null;
}

/**
 * Round to two decimals, half-to-even on exact binary ties (odd multiples of
 * 1/8, e.g. 0.125 -> 0.12). `toFixed` would round those away from zero.
 */
export function round2(value: number): number {
  const eighths = value * 8;
  let rounded: number;
  if (Number.isInteger(eighths) && Math.abs(eighths) % 2 === 1) {
    const floor = Math.floor(value * 100);
    rounded = (floor % 2 === 0 ? floor : floor + 1) / 100;
  } else {
    rounded = Number(value.toFixed(2));
  }
  // Collapse -0 so it groups with 0.
  return rounded === 0 ? 0 : rounded;
}

/**
 * Coerce a raw coordinate triple. Missing or malformed components become 0.
 */
export function roundVector(raw: unknown): Vec3 {
  const parts = Array.isArray(raw) ? raw : [];
  const component = (i: number): number => round2(toFiniteNumber(parts[i]) ?? 0);
  return [component(0), component(1), component(2)];
}

export function vectorKey(vec: readonly number[]): string {
  return vec.map((n) => round2(n).toFixed(2)).join(',');
}

function pairKey(position: Vec3, velocity: Vec3): string {
  return `${vectorKey(position)}|${vectorKey(velocity)}`;
}

/**
 * Ordered wall-hit events for one ball, resolved to wall names through the
 * record's cushion table.
 */
export function extractWallHits(
  raw: RawShotRecord,
  referenceBall: string = DEFAULT_REFERENCE_BALL
): WallHit[] {
  if (!isRecord(raw)) return [];
  const events = raw.events;
  const cushionMap: unknown = raw.cushion ?? {};
  if (!Array.isArray(events) || !isRecord(cushionMap)) return [];

  const hits: WallHit[] = [];
  for (const event of events) {
    if (!isRecord(event)) continue;
    if (event.ball_id !== referenceBall) continue;
    if (typeof event.type !== 'string' || !WALL_EVENT_TYPES.has(event.type)) continue;

    const cushionId = event.cushion_id;
    const mapped =
      cushionId === undefined || cushionId === null ? undefined : cushionMap[String(cushionId)];
    const hit: WallHit = {
      type: 'wall',
      name: typeof mapped === 'string' && mapped !== '' ? mapped : 'unknown',
      frame: toFiniteNumber(event.frame) ?? 0,
    };
    const index = toInteger(cushionId);
    if (index !== null) {
      hit.index = index;
    }
    hits.push(hit);
  }

  // Array#sort is stable, so same-frame hits keep their recorded order.
  return hits.sort((a, b) => a.frame - b.frame);
}

/**
 * True when any wall hit of the reference ball carries a cushion index above
 * `maxIndex`. Used to drop shots whose cushion ids fall outside the table.
 */
export function hasHitIndexAbove(
  raw: RawShotRecord,
  maxIndex: number,
  referenceBall: string = DEFAULT_REFERENCE_BALL
): boolean {
  return extractWallHits(raw, referenceBall).some(
    (hit) => hit.index !== undefined && hit.index > maxIndex
  );
}

function resolveVideoId(raw: Record<string, unknown>, position: number): string {
  if (typeof raw.video === 'string' && raw.video !== '') {
    return raw.video;
  }
  const meta: Record<string, unknown> = isRecord(raw.metadata) ? raw.metadata : {};
  const shotId = meta.shot_id;
  const usable =
    (typeof shotId === 'string' && shotId !== '') || (typeof shotId === 'number' && shotId !== 0);
  if (usable) {
    return String(shotId);
  }
  return `shot_${position}`;
}

type PocketOutcome = Pick<ShotOutcomes, 'pocketed' | 'whichPocket' | 'pocketColor'>;

/**
 * The pocket field may be a color string, an object carrying `color`, or some
 * other value; anything present counts as pocketed.
 */
function resolvePocket(outcomesRaw: unknown): PocketOutcome {
  if (!isRecord(outcomesRaw)) {
    return { pocketed: false, whichPocket: null, pocketColor: null };
  }
  const pocket = outcomesRaw.pocket;
  if (pocket === undefined || pocket === null) {
    return { pocketed: false, whichPocket: null, pocketColor: null };
  }

  let pocketColor: string | null;
  if (isRecord(pocket)) {
    const color = pocket.color;
    pocketColor = color === undefined || color === null ? null : String(color);
  } else {
    pocketColor = String(pocket);
  }
  return { pocketed: true, whichPocket: toJsonValue(pocket), pocketColor };
}

function storedWallHitCount(outcomesRaw: unknown): number {
  if (!isRecord(outcomesRaw)) return 0;
  const stored = outcomesRaw.wall_hits ?? outcomesRaw.num_wall_hits;
  if (stored === undefined || stored === null) return 0;
  return Math.max(0, toInteger(stored) ?? 0);
}

/**
 * Canonical entry for one raw shot summary. Never throws: anything missing or
 * malformed falls back to zeros and "not pocketed".
 */
export function normalizeShot(
  raw: RawShotRecord,
  position: number,
  options: NormalizeOptions = {}
): NormalizedEntry {
  const referenceBall = options.referenceBall ?? DEFAULT_REFERENCE_BALL;
  const record: Record<string, unknown> = isRecord(raw) ? raw : {};

  const balls: Record<string, unknown> = isRecord(record.balls) ? record.balls : {};
  const ball = balls[referenceBall];
  const source = isRecord(ball)
    ? { position: ball.initial_position, velocity: ball.initial_velocity, outcomes: ball.outcomes }
    : { position: record.position, velocity: record.velocity, outcomes: record.outcomes };

  const hitsDetail = extractWallHits(record, referenceBall);
  const wallHits = hitsDetail.map((hit) => hit.name);
  const numWallHits = wallHits.length > 0 ? wallHits.length : storedWallHitCount(source.outcomes);

  const meta: Record<string, unknown> = isRecord(record.metadata) ? record.metadata : {};
  const totalFrames = Math.max(0, toInteger(meta.total_frames) ?? 0);

  return {
    video: resolveVideoId(record, position),
    initialState: {
      position: roundVector(source.position),
      velocity: roundVector(source.velocity),
    },
    outcomes: {
      numWallHits,
      wallHits,
      ...resolvePocket(source.outcomes),
    },
    hitsDetail,
    totalFrames,
  };
}

/**
 * Normalize every record and group the results for counterfactual lookups.
 * Sim ids are positions in `records`.
 */
export function buildShotIndex(
  records: readonly RawShotRecord[],
  options: NormalizeOptions = {}
): ShotIndex {
  const index: ShotIndex = {
    entries: new Map(),
    byPositionVelocity: new Map(),
    byPosition: new Map(),
    byVelocity: new Map(),
  };

  records.forEach((raw, simId) => {
    const entry = normalizeShot(raw, simId, options);
    index.entries.set(simId, entry);

    const { position, velocity } = entry.initialState;
    const pair = pairKey(position, velocity);
    if (!index.byPositionVelocity.has(pair)) {
      index.byPositionVelocity.set(pair, simId);
    }
    appendTo(index.byPosition, vectorKey(position), simId);
    appendTo(index.byVelocity, vectorKey(velocity), simId);
  });

  return index;
}

export function lookupByPositionVelocity(
  index: ShotIndex,
  position: Vec3,
  velocity: Vec3
): number | undefined {
  return index.byPositionVelocity.get(pairKey(position, velocity));
}

function appendTo(map: Map<string, number[]>, key: string, simId: number): void {
  const bucket = map.get(key);
  if (bucket) {
    bucket.push(simId);
  } else {
    map.set(key, [simId]);
  }
}
