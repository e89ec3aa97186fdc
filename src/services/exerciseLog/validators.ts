import { format, isValid, parse } from 'date-fns';
import { AppError } from '@/lib/errors';
import { joinNumbers } from '@/services/sheets/serializer';
import type { Laterality } from '@/services/sheets/types';
import { BODY_PARTS, LATERALITIES, type BodyPart, type ExerciseRow, type ManualEntry } from './types';

const DATE_FORMATS = ['yyyy-MM-dd', 'MM/dd/yyyy', 'dd/MM/yyyy', 'yyyy/MM/dd'];
const REFERENCE_DATE = new Date(2000, 0, 1);

export function parseCompletedDate(input: string): string {
  const value = input.trim();
  for (const fmt of DATE_FORMATS) {
    const d = parse(value, fmt, REFERENCE_DATE);
    if (isValid(d)) return format(d, 'yyyy-MM-dd');
  }
  throw new AppError('INVALID_DATE', `Unable to parse date: ${input}`);
}

export function isBodyPart(value: string): value is BodyPart {
  return (BODY_PARTS as readonly string[]).includes(value);
}

export function toLaterality(value: string): Laterality | null {
  const v = value.trim().toLowerCase();
  return LATERALITIES.find(l => l === v) ?? null;
}

function requireLength(values: number[] | undefined, sets: number, flag: string): number[] {
  if (!values) throw new AppError('INVALID_ENTRY', `Bilateral exercises require --${flag}`);
  if (values.length !== sets) throw new AppError('INVALID_ENTRY', `--${flag} must have ${sets} values`);
  return values;
}

/** Strict checks for entries typed in by hand; sheet imports go through importRecords instead. */
export function validateManualEntry(entry: ManualEntry): ExerciseRow {
  if (!isBodyPart(entry.body_part)) {
    throw new AppError('INVALID_ENTRY', `Invalid body part: ${entry.body_part}`);
  }
  const laterality = toLaterality(entry.laterality);
  if (!laterality) {
    throw new AppError('INVALID_ENTRY', `Invalid laterality: ${entry.laterality}`);
  }
  if (!Number.isInteger(entry.sets) || entry.sets <= 0) {
    throw new AppError('INVALID_ENTRY', 'Sets must be a positive integer');
  }

  const base = {
    date_completed: parseCompletedDate(entry.date_completed),
    body_part: entry.body_part,
    exercise_name: entry.exercise_name.trim(),
    laterality,
    sets: entry.sets,
  };

  if (laterality === 'unilateral') {
    if (!entry.weights || !entry.reps) {
      throw new AppError('INVALID_ENTRY', 'Unilateral exercises require --weight and --reps');
    }
    if (entry.weights.length !== entry.sets || entry.reps.length !== entry.sets) {
      throw new AppError('INVALID_ENTRY', 'Number of weight and rep values must equal sets');
    }
    return {
      ...base,
      weight_left: joinNumbers(entry.weights),
      weight_right: null,
      reps_left: joinNumbers(entry.reps),
      reps_right: null,
    };
  }

  return {
    ...base,
    weight_left: joinNumbers(requireLength(entry.weights_left, entry.sets, 'weight-left')),
    weight_right: joinNumbers(requireLength(entry.weights_right, entry.sets, 'weight-right')),
    reps_left: joinNumbers(requireLength(entry.reps_left, entry.sets, 'reps-left')),
    reps_right: joinNumbers(requireLength(entry.reps_right, entry.sets, 'reps-right')),
  };
}
