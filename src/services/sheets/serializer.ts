import { AppError } from '@/lib/errors';
import type { ExerciseRecord, Laterality, SerializedRecord } from './types';

export function joinNumbers(nums: readonly number[] | undefined): string | null {
  return nums && nums.length ? nums.join(',') : null;
}

export function splitNumbers(value: string | null | undefined, field: string): number[] {
  if (value == null || value.trim() === '') return [];
  return value.split(/[,;]/).map(part => {
    const t = part.trim();
    if (!/^\d+$/.test(t)) {
      throw new AppError('INVALID_ROW', `Field ${field} has non-numeric entry "${t}"`);
    }
    return parseInt(t, 10);
  });
}

export function serializeRecord(record: ExerciseRecord): SerializedRecord {
  const out: SerializedRecord = {
    exercise_name: record.exercise_name,
    laterality: record.laterality,
    reps_left: joinNumbers(record.reps_left),
    reps_right: record.laterality === 'bilateral' ? joinNumbers(record.reps_right) : null,
    sets: record.sets,
    weight_left: joinNumbers(record.weight_left),
    weight_right: record.laterality === 'bilateral' ? joinNumbers(record.weight_right) : null,
  };
  if (record.extra_text) out.extra_text = record.extra_text;
  return out;
}

export function serializeRecords(records: readonly ExerciseRecord[]): SerializedRecord[] {
  return records.map(serializeRecord);
}

function toLaterality(value: string): Laterality {
  const v = value.trim().toLowerCase();
  if (v === 'unilateral' || v === 'bilateral') return v;
  throw new AppError('INVALID_ROW', `Unknown laterality "${value}"`);
}

export function deserializeRecord(row: SerializedRecord): ExerciseRecord {
  const laterality = toLaterality(row.laterality);
  const record: ExerciseRecord = {
    exercise_name: row.exercise_name,
    laterality,
    sets: row.sets,
    weight_left: splitNumbers(row.weight_left, 'weight_left'),
    reps_left: splitNumbers(row.reps_left, 'reps_left'),
  };
  if (laterality === 'bilateral') {
    record.weight_right = splitNumbers(row.weight_right, 'weight_right');
    record.reps_right = splitNumbers(row.reps_right, 'reps_right');
  }
  if (row.extra_text) record.extra_text = row.extra_text;
  return record;
}
