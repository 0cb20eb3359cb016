export type Vec3 = [number, number, number];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Shot summaries come from the simulator as loosely shaped JSON and are
 * narrowed field by field during normalization.
 */
export type RawShotRecord = unknown;

export interface WallHit {
  type: 'wall';
  name: string;
  frame: number;
  /** Cushion id, when it parses as an integer. */
  index?: number;
}

export interface ShotOutcomes {
  numWallHits: number;
  /** Wall names in hit order. Empty when only a legacy count was recorded. */
  wallHits: string[];
  pocketed: boolean;
  whichPocket: JsonValue | null;
  pocketColor: string | null;
}

export interface InitialState {
  position: Vec3;
  velocity: Vec3;
}

export interface NormalizedEntry {
  video: string;
  initialState: InitialState;
  outcomes: ShotOutcomes;
  hitsDetail: WallHit[];
  totalFrames: number;
}

export interface ShotIndex {
  entries: Map<number, NormalizedEntry>;
  /** First-seen sim id per exact (position, velocity) pair. */
  byPositionVelocity: Map<string, number>;
  byPosition: Map<string, number[]>;
  byVelocity: Map<string, number[]>;
}

export interface NormalizeOptions {
  referenceBall?: string;
}
