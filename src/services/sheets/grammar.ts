// Handwriting shorthand used on the sheets:
//   90# x 10, 8            weight, separator, reps; bare numbers reuse the last weight
//   L - 20# x 10 R - ...   left/right sections for bilateral work
//   #4                     an equipment setting (hole, pin), not a rep count

import type { ParseWarning } from './types';

export const WEIGHT_MARKER = '#';
export const SEPARATOR = 'x';
export const LEFT_MARKER = 'L -';
export const RIGHT_MARKER = 'R -';

export const MAX_DIGITS = 3;

export const PAIR_RE = /(\d+)#\s*[x×]\s*(\d+)/gi;
export const NUMBER_RE = /\d+/g;

const ALT_SEPARATOR_RE = /×/g;
const FILLER_TOKEN_RE = /^[#x×,\-]+$/i;

export function normalizeSeparators(text: string): string {
  return text.replace(ALT_SEPARATOR_RE, SEPARATOR);
}

export function isDigitTokenTooLong(token: string): boolean {
  return token.length > MAX_DIGITS;
}

/** True when the digit run at `start` directly follows the weight marker, e.g. "#4". */
export function isEquipmentSetting(text: string, start: number): boolean {
  return start > 0 && text[start - 1] === WEIGHT_MARKER;
}

/**
 * Accepts a digit token or records a digits_too_long warning.
 * Four or more digits are nearly always two numbers the OCR fused together.
 */
export function validateDigitToken(token: string, boxText: string, warnings: ParseWarning[]): number | null {
  if (isDigitTokenTooLong(token)) {
    warnings.push({ box_text: boxText, token, reason: 'digits_too_long' });
    return null;
  }
  return parseInt(token, 10);
}

export function blankSpans(text: string, spans: Array<[number, number]>): string {
  let out = text;
  for (const [start, end] of spans) {
    out = out.slice(0, start) + ' '.repeat(end - start) + out.slice(end);
  }
  return out;
}

// Residue keeps words only; stray markers, separators, commas and dashes are noise
export function cleanResidue(text: string): string | undefined {
  const words = text
    .split(/\s+/)
    .map(w => w.replace(/^,+|,+$/g, ''))
    .filter(w => w && !FILLER_TOKEN_RE.test(w));
  return words.length ? words.join(' ') : undefined;
}
