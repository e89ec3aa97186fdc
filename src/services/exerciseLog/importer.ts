import { errorMessage } from '@/lib/errors';
import { logger } from '@/lib/logger';
import { splitNumbers } from '@/services/sheets/serializer';
import type { SerializedRecord } from '@/services/sheets/types';
import type { ExerciseLogStore } from './store';
import type { ExerciseRow, ImportSummary, StoredExerciseRow } from './types';
import { isBodyPart, parseCompletedDate, toLaterality } from './validators';

export interface ImportOptions {
  dateCompleted: string;
  bodyPartFor: (exerciseName: string) => string;
  skipDuplicates?: boolean;
}

/** Body part per exercise name, taken from the earliest logged row. */
export function buildBodyPartLookup(rows: readonly StoredExerciseRow[]): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const row of [...rows].sort((a, b) => a.id - b.id)) {
    if (!lookup.has(row.exercise_name)) lookup.set(row.exercise_name, row.body_part);
  }
  return lookup;
}

// Sheets and spreadsheets sometimes use ';' between values; the table stores ','
function normalizeSequence(value: string | null | undefined, field: string): string | null {
  const nums = splitNumbers(value, field);
  return nums.length ? nums.join(',') : null;
}

/**
 * Writes parsed sheet records to the exercise log.
 * Rows with an invalid laterality or set count are counted as errors and skipped;
 * an unknown body part is only reported.
 */
export async function importRecords(
  store: ExerciseLogStore,
  records: readonly SerializedRecord[],
  options: ImportOptions
): Promise<ImportSummary> {
  const skipDuplicates = options.skipDuplicates ?? true;
  const summary: ImportSummary = { imported: 0, skipped: 0, errors: 0 };
  const date = parseCompletedDate(options.dateCompleted);

  for (const [i, rec] of records.entries()) {
    const label = `record ${i + 1} (${rec.exercise_name})`;
    try {
      const laterality = toLaterality(String(rec.laterality));
      if (!laterality) {
        logger.error(`❌ ${label}: invalid laterality '${rec.laterality}', skipping`);
        summary.errors++;
        continue;
      }
      if (!Number.isInteger(rec.sets) || rec.sets <= 0) {
        logger.error(`❌ ${label}: invalid sets value '${rec.sets}', skipping`);
        summary.errors++;
        continue;
      }

      const bodyPart = options.bodyPartFor(rec.exercise_name).trim();
      if (!isBodyPart(bodyPart)) {
        logger.warn(`⚠️ ${label}: unknown body part '${bodyPart}', proceeding anyway`);
      }

      const bilateral = laterality === 'bilateral';
      const row: ExerciseRow = {
        date_completed: date,
        body_part: bodyPart,
        exercise_name: rec.exercise_name.trim(),
        laterality,
        sets: rec.sets,
        weight_left: normalizeSequence(rec.weight_left, 'weight_left'),
        weight_right: bilateral ? normalizeSequence(rec.weight_right, 'weight_right') : null,
        reps_left: normalizeSequence(rec.reps_left, 'reps_left'),
        reps_right: bilateral ? normalizeSequence(rec.reps_right, 'reps_right') : null,
      };

      if (skipDuplicates && (await store.exists(row))) {
        logger.info(`📄 Skipping ${label}: duplicate entry on ${date}`);
        summary.skipped++;
        continue;
      }

      await store.insert(row);
      summary.imported++;
    } catch (error) {
      logger.error(`❌ Error processing ${label}:`, errorMessage(error));
      summary.errors++;
    }
  }

  return summary;
}
