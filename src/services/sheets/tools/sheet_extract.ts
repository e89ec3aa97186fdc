// sheet_extract.ts
// Reads the OCR dump of one filled-in sheet and writes the parsed exercise
// records as JSON. Usage:
//   npm run extract -- <ocr.json> [-o <out.json>]
//
// The dump is either a list of { exercise_name, text } boxes, or
// { pageText, boxes } where pageText is the printed layer (title first)
// and boxes the handwriting read from each box, top to bottom.

import { readFileSync, writeFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { AppError, errorMessage } from '@/lib/errors';
import { logger } from '@/lib/logger';
import { pairBoxes, parseSheet, resolveExerciseNames, serializeRecords } from '../index';
import type { RawBox, SerializedRecord } from '../types';

export interface ExtractArgs {
  input: string;
  output: string;
}

function isRecordLike(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function toRawBox(v: unknown, index: number): RawBox {
  if (!isRecordLike(v) || typeof v.exercise_name !== 'string' || typeof v.text !== 'string') {
    throw new AppError('INVALID_ROW', `Box ${index} must have string 'exercise_name' and 'text' fields`);
  }
  return { exercise_name: v.exercise_name, text: v.text };
}

export function readBoxes(data: unknown): RawBox[] {
  if (Array.isArray(data)) return data.map(toRawBox);
  const pageText = isRecordLike(data) ? data.pageText : undefined;
  const boxes = isRecordLike(data) ? data.boxes : undefined;
  if (typeof pageText === 'string' && Array.isArray(boxes)) {
    const texts = boxes.map((t: unknown, i: number) => {
      if (typeof t !== 'string') throw new AppError('INVALID_ROW', `Box ${i} text must be a string`);
      return t.replace(/\n/g, ' ').trim();
    });
    return pairBoxes(resolveExerciseNames(pageText), texts);
  }
  throw new AppError('INVALID_ROW', "Expected a list of boxes or an object with 'pageText' and 'boxes'");
}

export function parseArgs(argv: string[]): ExtractArgs | null {
  let input: string | undefined;
  let output: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '-o' || a === '--output') {
      output = argv[++i];
      if (!output) return null;
    } else if (!input) {
      input = a;
    } else {
      return null;
    }
  }
  if (!input) return null;
  const parsed = path.parse(input);
  return { input, output: output ?? path.join(parsed.dir, `${parsed.name}.records.json`) };
}

export function extractSheet(args: ExtractArgs): SerializedRecord[] {
  const data: unknown = JSON.parse(readFileSync(args.input, 'utf-8'));
  const { records, warnings, rejected } = parseSheet(readBoxes(data));
  if (rejected.length) logger.warn(`⚠️ ${rejected.length} boxes skipped without an exercise name`);
  const rows = serializeRecords(records);
  writeFileSync(args.output, JSON.stringify(rows, null, 2) + '\n', 'utf-8');
  logger.info(`✅ Wrote ${rows.length} records to ${args.output}` + (warnings.length ? ` (${warnings.length} warnings)` : ''));
  return rows;
}

function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    console.log('Usage: npm run extract -- <ocr.json> [-o <out.json>]');
    process.exit(1);
  }
  try {
    extractSheet(args);
  } catch (error) {
    logger.error('❌ Extract failed:', errorMessage(error));
    process.exit(1);
  }
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main();
}
