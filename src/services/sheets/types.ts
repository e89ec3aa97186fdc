// Workout sheet parsing types

export type Laterality = 'unilateral' | 'bilateral';

export type WarningReason = 'digits_too_long' | 'side_count_mismatch';

/** Handwritten box text tied to the printed exercise line above it. */
export interface RawBox {
  readonly exercise_name: string;
  readonly text: string;
}

export interface WeightRepPair {
  weight: number;
  reps: number;
}

/** Parse output for one side; weights[i] is the load for reps[i]. */
export interface SideResult {
  weights: number[];
  reps: number[];
  residue?: string;
}

export interface ExerciseRecord {
  exercise_name: string;
  laterality: Laterality;
  sets: number;
  weight_left: number[];
  weight_right?: number[];
  reps_left: number[];
  reps_right?: number[];
  extra_text?: string;
}

export interface ParseWarning {
  box_text: string;
  token: string;
  reason: WarningReason;
}

export interface Parsed<T> {
  value: T;
  warnings: ParseWarning[];
}

// Storage-facing shape: sequences are comma strings, null when empty or not applicable
export interface SerializedRecord {
  exercise_name: string;
  laterality: Laterality;
  reps_left: string | null;
  reps_right: string | null;
  sets: number;
  weight_left: string | null;
  weight_right: string | null;
  extra_text?: string;
}
