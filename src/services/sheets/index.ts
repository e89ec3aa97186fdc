import { AppError } from '@/lib/errors';
import { logger } from '@/lib/logger';
import { assembleRecord } from './recordAssembler';
import type { ExerciseRecord, ParseWarning, RawBox } from './types';

export * from './types';
export { assembleRecord, splitSides } from './recordAssembler';
export { parseSide } from './sideParser';
export { extractPairs } from './pairExtractor';
export { resolveExerciseName, resolveExerciseNames } from './nameResolver';
export { serializeRecord, serializeRecords, deserializeRecord } from './serializer';
export { computeBoxRegions } from './layout';

export interface SheetResult {
  records: ExerciseRecord[];
  warnings: ParseWarning[];
  /** Boxes left out because their printed line gave no exercise name. */
  rejected: RawBox[];
}

export function pairBoxes(names: readonly string[], texts: readonly string[]): RawBox[] {
  if (names.length !== texts.length) {
    throw new AppError(
      'BOX_COUNT_MISMATCH',
      `Sheet lists ${names.length} exercises but ${texts.length} boxes were read`
    );
  }
  return names.map((exercise_name, i) => ({ exercise_name, text: texts[i] }));
}

export function parseSheet(boxes: readonly RawBox[]): SheetResult {
  logger.debug('📄 Parsing sheet boxes:', boxes.length);
  const records: ExerciseRecord[] = [];
  const warnings: ParseWarning[] = [];
  const rejected: RawBox[] = [];

  for (const box of boxes) {
    let parsed: ReturnType<typeof assembleRecord>;
    try {
      parsed = assembleRecord(box);
    } catch (error) {
      if (!(error instanceof AppError) || error.code !== 'MISSING_EXERCISE_NAME') throw error;
      logger.error(`❌ Skipping box '${box.text}': ${error.message}`);
      rejected.push(box);
      continue;
    }
    const { value, warnings: boxWarnings } = parsed;
    records.push(value);
    for (const w of boxWarnings) {
      logger.warn(`⚠️ ${w.reason}: token '${w.token}' in '${w.box_text}'`);
    }
    warnings.push(...boxWarnings);
  }

  logger.debug('✅ Parsed records:', records.length);
  return { records, warnings, rejected };
}
