import { AppError } from '@/lib/errors';
import {
  LEFT_MARKER,
  NUMBER_RE,
  RIGHT_MARKER,
  blankSpans,
  cleanResidue,
  normalizeSeparators,
  validateDigitToken,
} from './grammar';
import { parseSide } from './sideParser';
import type { ExerciseRecord, Parsed, ParseWarning, RawBox } from './types';

export interface SideSplit {
  /** Text written before the L header; belongs to neither side. */
  prefix: string;
  left: string;
  right: string;
}

/**
 * Splits "L - ... R - ..." into its two sections. Both headers must be present
 * with R after L; anything else is read as a single unilateral side.
 */
export function splitSides(text: string): SideSplit | null {
  const l = text.indexOf(LEFT_MARKER);
  if (l === -1) return null;
  const leftStart = l + LEFT_MARKER.length;
  const r = text.indexOf(RIGHT_MARKER, leftStart);
  if (r === -1) return null;
  return {
    prefix: text.slice(0, l),
    left: text.slice(leftStart, r),
    right: text.slice(r + RIGHT_MARKER.length),
  };
}

function joinResidues(residues: Array<string | undefined>): string | undefined {
  const parts = residues.filter((r): r is string => !!r);
  return parts.length ? parts.join(' ') : undefined;
}

// Digits ahead of the L header are not sets; they stay readable in extra_text
function readPrefix(prefix: string, boxText: string, warnings: ParseWarning[]): string | undefined {
  const spans: Array<[number, number]> = [];
  for (const m of prefix.matchAll(NUMBER_RE)) {
    const index = m.index ?? 0;
    if (validateDigitToken(m[0], boxText, warnings) === null) spans.push([index, index + m[0].length]);
  }
  return cleanResidue(blankSpans(prefix, spans));
}

export function assembleRecord(box: RawBox): Parsed<ExerciseRecord> {
  const exercise_name = String(box.exercise_name ?? '').trim();
  if (!exercise_name) {
    throw new AppError('MISSING_EXERCISE_NAME', `Box "${box.text}" has no exercise name`);
  }

  const text = normalizeSeparators(box.text);
  const split = splitSides(text);

  if (!split) {
    const side = parseSide(text, box.text);
    const extra_text = joinResidues([side.value.residue]);
    const record: ExerciseRecord = {
      exercise_name,
      laterality: 'unilateral',
      sets: side.value.reps.length,
      weight_left: side.value.weights,
      reps_left: side.value.reps,
      ...(extra_text ? { extra_text } : {}),
    };
    return { value: record, warnings: side.warnings };
  }

  const warnings: ParseWarning[] = [];
  const prefix = readPrefix(split.prefix, box.text, warnings);
  const left = parseSide(split.left, box.text);
  const right = parseSide(split.right, box.text);
  warnings.push(...left.warnings, ...right.warnings);

  const setsLeft = left.value.reps.length;
  const setsRight = right.value.reps.length;
  if (setsLeft !== setsRight) {
    warnings.push({ box_text: box.text, token: `${setsLeft}:${setsRight}`, reason: 'side_count_mismatch' });
  }

  const extra_text = joinResidues([prefix, left.value.residue, right.value.residue]);
  const record: ExerciseRecord = {
    exercise_name,
    laterality: 'bilateral',
    sets: Math.max(setsLeft, setsRight),
    weight_left: left.value.weights,
    weight_right: right.value.weights,
    reps_left: left.value.reps,
    reps_right: right.value.reps,
    ...(extra_text ? { extra_text } : {}),
  };
  return { value: record, warnings };
}
