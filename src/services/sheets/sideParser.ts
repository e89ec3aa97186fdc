import { NUMBER_RE, blankSpans, cleanResidue, isEquipmentSetting, validateDigitToken } from './grammar';
import { extractPairs } from './pairExtractor';
import type { Parsed, SideResult } from './types';

interface SetEntry {
  index: number;
  reps: number;
  weight?: number;
}

/**
 * Parses the text of one side of a box.
 *
 * Bare numbers are extra sets at the most recent weight written before them
 * ("90# x 10, 8" is two sets at 90). Before any pair the weight is 0, which is
 * how bodyweight work is written.
 */
export function parseSide(text: string, boxText: string): Parsed<SideResult> {
  const { pairs, remainder, warnings } = extractPairs(text, boxText);
  const entries: SetEntry[] = [...pairs];
  const spans: Array<[number, number]> = [];

  for (const m of remainder.matchAll(NUMBER_RE)) {
    const index = m.index ?? 0;
    spans.push([index, index + m[0].length]);
    const reps = validateDigitToken(m[0], boxText, warnings);
    if (reps === null || isEquipmentSetting(remainder, index)) continue;
    entries.push({ index, reps });
  }

  const weights: number[] = [];
  const reps: number[] = [];
  let lastWeight = 0;
  for (const e of entries.sort((a, b) => a.index - b.index)) {
    if (e.weight !== undefined) lastWeight = e.weight;
    weights.push(lastWeight);
    reps.push(e.reps);
  }

  const residue = cleanResidue(blankSpans(remainder, spans));
  const value: SideResult = residue ? { weights, reps, residue } : { weights, reps };
  return { value, warnings };
}
