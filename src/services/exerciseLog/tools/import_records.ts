// import_records.ts
// Loads the JSON written by sheet_extract into the exercises table.
//   npm run import -- <records.json> --date <date> [--allow-duplicates]
// Body parts come from earlier log entries for the same exercise name.

import { readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { AppError, errorMessage } from '@/lib/errors';
import { logger } from '@/lib/logger';
import type { SerializedRecord } from '@/services/sheets/types';
import { buildBodyPartLookup, importRecords } from '../importer';
import { SupabaseExerciseLogStore } from '../store';

export interface ImportArgs {
  file: string;
  date: string;
  skipDuplicates: boolean;
}

export function parseArgs(argv: string[]): ImportArgs | null {
  let file: string | undefined;
  let date: string | undefined;
  let skipDuplicates = true;
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--date' || a === '-d') date = argv[++i];
    else if (a === '--allow-duplicates') skipDuplicates = false;
    else if (!file) file = a;
    else return null;
  }
  if (!file || !date) return null;
  return { file, date, skipDuplicates };
}

function readRecords(file: string): SerializedRecord[] {
  const data: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  if (!Array.isArray(data)) {
    throw new AppError('INVALID_ROW', `${file} must contain a list of records`);
  }
  return data;
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    console.log('Usage: npm run import -- <records.json> --date <date> [--allow-duplicates]');
    process.exit(1);
  }

  const store = new SupabaseExerciseLogStore();
  const lookup = buildBodyPartLookup(await store.list());
  const summary = await importRecords(store, readRecords(args.file), {
    dateCompleted: args.date,
    bodyPartFor: name => lookup.get(name) ?? 'Unknown',
    skipDuplicates: args.skipDuplicates,
  });

  logger.info('✅ Import complete:');
  logger.info(`  Imported: ${summary.imported} rows`);
  logger.info(`  Skipped:  ${summary.skipped} rows (duplicates)`);
  logger.info(`  Errors:   ${summary.errors} rows`);
  if (summary.errors > 0) process.exit(1);
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch(error => {
    logger.error('❌ Import failed:', errorMessage(error));
    process.exit(1);
  });
}
