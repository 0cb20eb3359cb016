import type { InitialState, Vec3 } from '../shots/types.js';

export const QUESTION_TYPES = [
  'descriptive',
  'predictive',
  'counterfactual_velocity',
  'counterfactual_position',
] as const;

export type QuestionType = (typeof QUESTION_TYPES)[number];

export interface TableDimensions {
  width: number;
  height: number;
}

export interface GenerationOptions {
  numOptions: number;
  numCorrect: number;
  numDescriptivePerShot: number;
  numPredictivePerShot: number;
  maxVelocityCfsPerShot: number;
  maxPositionCfsPerShot: number;
  /** Wall hits before `fraction * totalFrames` are hidden from predictive questions. */
  predictiveSplitFraction: number;
  filterInconsistentDistractors: boolean;
  table: TableDimensions;
}

export const DEFAULT_GENERATION_OPTIONS: GenerationOptions = {
  numOptions: 4,
  numCorrect: 1,
  numDescriptivePerShot: 1,
  numPredictivePerShot: 1,
  maxVelocityCfsPerShot: 3,
  maxPositionCfsPerShot: 3,
  predictiveSplitFraction: 0.5,
  filterInconsistentDistractors: false,
  table: { width: 0.9906, height: 1.9812 },
};

// Wire format: field names are snake_case as written to JSONL.

export interface CounterfactualInitialState {
  position: Vec3;
  velocity: Vec3;
}

export interface SequencedQuestionMetadata {
  question_type: 'descriptive' | 'predictive';
  sim_id: number;
  question_index_within_shot: number;
}

export interface CounterfactualQuestionMetadata {
  question_type: 'counterfactual_velocity' | 'counterfactual_position';
  sim_id: number;
  counterfactual_sim_id: number;
  counterfactual_video: string;
  counterfactual_initial_state: CounterfactualInitialState;
}

export type McqMetadata = SequencedQuestionMetadata | CounterfactualQuestionMetadata;

export interface McqRecord {
  video: string;
  question: string;
  options: string[];
  ground_truth: number[];
  metadata: McqMetadata;
}

export function toWireInitialState(state: InitialState): CounterfactualInitialState {
  return { position: [...state.position], velocity: [...state.velocity] };
}
