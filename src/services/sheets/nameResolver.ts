// Printed exercise labels. OCR of the printed layer sometimes runs the
// handwriting into the same line ("Goblet Squat - 35# x 12"), so the label
// is cut at the first side header or digit.

const CONTENT_START_RE = /(?:[LR]\s*-\s*|\d)/;
const DELIMITER = ' - ';

export function resolveExerciseName(line: string): string {
  const m = CONTENT_START_RE.exec(line);
  if (!m) return line.trim();
  const start = m.index;
  const idx = start >= DELIMITER.length ? line.lastIndexOf(DELIMITER, start - DELIMITER.length) : -1;
  return (idx !== -1 ? line.slice(0, idx) : line.slice(0, start)).trim();
}

/** Resolves every exercise line of a printed page; the first line is the sheet title. */
export function resolveExerciseNames(pageText: string): string[] {
  const lines = pageText
    .split(/\r?\n/)
    .map(l => l.trim())
    .filter(Boolean);
  return lines.slice(1).map(resolveExerciseName);
}
