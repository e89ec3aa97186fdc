import { PAIR_RE, blankSpans, validateDigitToken } from './grammar';
import type { ParseWarning, WeightRepPair } from './types';

export interface LocatedPair extends WeightRepPair {
  /** Offset of the match in the side's text. */
  index: number;
}

export interface PairExtraction {
  pairs: LocatedPair[];
  weights: number[];
  reps: number[];
  /** Input with every matched pair blanked out, offsets preserved. */
  remainder: string;
  warnings: ParseWarning[];
}

/**
 * Pulls explicit "90# x 10" pairs out of one side's text, left to right.
 * A match is blanked from the remainder even when one of its tokens is rejected,
 * so its numbers are never counted again as bare reps.
 */
export function extractPairs(text: string, boxText: string): PairExtraction {
  const pairs: LocatedPair[] = [];
  const warnings: ParseWarning[] = [];
  const spans: Array<[number, number]> = [];

  for (const m of text.matchAll(PAIR_RE)) {
    const index = m.index ?? 0;
    spans.push([index, index + m[0].length]);
    const weight = validateDigitToken(m[1], boxText, warnings);
    const reps = validateDigitToken(m[2], boxText, warnings);
    if (weight !== null && reps !== null) pairs.push({ weight, reps, index });
  }

  return {
    pairs,
    weights: pairs.map(p => p.weight),
    reps: pairs.map(p => p.reps),
    remainder: blankSpans(text, spans),
    warnings,
  };
}
