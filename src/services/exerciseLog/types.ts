import type { Laterality } from '@/services/sheets/types';

export const BODY_PARTS = [
  'Chest', 'Upper Back', 'Lower Back', 'Shoulders', 'Calves', 'Glutes', 'Core',
  'Biceps', 'Triceps', 'Rotator Cuff', 'Neck', 'Forearm', 'Hamstrings',
  'Quads', 'Traps', 'Tibia Dorsi', 'Knee', 'Hip', 'Legs',
] as const;

export type BodyPart = typeof BODY_PARTS[number];

export const LATERALITIES: readonly Laterality[] = ['unilateral', 'bilateral'];

/** One row of the `exercises` table. Sequence columns hold comma-joined integers. */
export interface ExerciseRow {
  date_completed: string;
  body_part: string;
  exercise_name: string;
  laterality: Laterality;
  sets: number;
  weight_left: string | null;
  weight_right: string | null;
  reps_left: string | null;
  reps_right: string | null;
}

export interface StoredExerciseRow extends ExerciseRow {
  id: number;
}

export interface ManualEntry {
  date_completed: string;
  body_part: string;
  exercise_name: string;
  laterality: string;
  sets: number;
  weights?: number[];
  reps?: number[];
  weights_left?: number[];
  weights_right?: number[];
  reps_left?: number[];
  reps_right?: number[];
}

export interface ImportSummary {
  imported: number;
  skipped: number;
  errors: number;
}
