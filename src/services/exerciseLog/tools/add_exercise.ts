// add_exercise.ts
// Manual entry into the exercises table, for sets logged without a sheet.
//   npm run log -- add --date 2024-03-05 --body-part Chest --name "Bench Press" \
//     --laterality unilateral --sets 2 --weight 90 90 --reps 10 8
//   npm run log -- add ... --laterality bilateral --sets 2 \
//     --weight-left 20 20 --weight-right 20 20 --reps-left 10 8 --reps-right 10 8
//   npm run log -- list

import path from 'path';
import { fileURLToPath } from 'url';
import { AppError, errorMessage } from '@/lib/errors';
import { logger } from '@/lib/logger';
import { SupabaseExerciseLogStore, type ExerciseLogStore } from '../store';
import type { ExerciseRow, ManualEntry, StoredExerciseRow } from '../types';
import { validateManualEntry } from '../validators';

export type LogCommand = { kind: 'add'; entry: ManualEntry } | { kind: 'list' };

const NUMBER_FLAGS = {
  weight: 'weights',
  reps: 'reps',
  'weight-left': 'weights_left',
  'weight-right': 'weights_right',
  'reps-left': 'reps_left',
  'reps-right': 'reps_right',
} as const;

type NumberFlag = keyof typeof NUMBER_FLAGS;

function isNumberFlag(flag: string): flag is NumberFlag {
  return flag in NUMBER_FLAGS;
}

function toNumbers(flag: string, values: string[]): number[] {
  return values.map(v => {
    const n = Number(v);
    if (!Number.isInteger(n) || n < 0) {
      throw new AppError('INVALID_ENTRY', `--${flag} takes whole numbers, got "${v}"`);
    }
    return n;
  });
}

/** Flags take every following argument up to the next flag, so names need no quoting. */
export function parseArgs(argv: string[]): LogCommand | null {
  const [command, ...rest] = argv;
  if (command === 'list') return rest.length ? null : { kind: 'list' };
  if (command !== 'add') return null;

  const flags = new Map<string, string[]>();
  let current: string[] | null = null;
  for (const a of rest) {
    if (a.startsWith('--')) {
      current = [];
      flags.set(a.slice(2), current);
    } else if (current) {
      current.push(a);
    } else {
      return null;
    }
  }

  const text = (flag: string) => flags.get(flag)?.join(' ').trim() || undefined;
  const date = text('date');
  const bodyPart = text('body-part');
  const name = text('name');
  const laterality = text('laterality');
  const sets = text('sets');
  if (!date || !bodyPart || !name || !laterality || !sets) return null;

  const entry: ManualEntry = {
    date_completed: date,
    body_part: bodyPart,
    exercise_name: name,
    laterality,
    sets: Number(sets),
  };
  for (const [flag, values] of flags) {
    if (isNumberFlag(flag)) entry[NUMBER_FLAGS[flag]] = toNumbers(flag, values);
  }
  return { kind: 'add', entry };
}

export async function addExercise(store: ExerciseLogStore, entry: ManualEntry): Promise<ExerciseRow> {
  const row = validateManualEntry(entry);
  await store.insert(row);
  logger.info(`✅ Exercise added: ${row.exercise_name} on ${row.date_completed}`);
  return row;
}

export async function listExercises(store: ExerciseLogStore): Promise<StoredExerciseRow[]> {
  const rows = await store.list();
  for (const r of rows) {
    logger.info(
      [r.id, r.date_completed, r.body_part, r.exercise_name, r.laterality, r.sets, r.weight_left, r.weight_right, r.reps_left, r.reps_right]
        .map(v => v ?? '-')
        .join(' | ')
    );
  }
  return rows;
}

async function main() {
  const command = parseArgs(process.argv.slice(2));
  if (!command) {
    console.log('Usage: npm run log -- add --date <date> --body-part <part> --name <name> --laterality <unilateral|bilateral> --sets <n> [...]');
    console.log('       npm run log -- list');
    process.exit(1);
  }
  const store = new SupabaseExerciseLogStore();
  if (command.kind === 'list') await listExercises(store);
  else await addExercise(store, command.entry);
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch(error => {
    logger.error('❌ Log command failed:', errorMessage(error));
    process.exit(1);
  });
}
