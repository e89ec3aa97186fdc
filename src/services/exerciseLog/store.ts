import type { SupabaseClient } from '@supabase/supabase-js';
import { AppError } from '@/lib/errors';
import { getSupabase } from '@/lib/supabase';
import type { ExerciseRow, StoredExerciseRow } from './types';

export interface ExerciseLogStore {
  insert(row: ExerciseRow): Promise<void>;
  /** Same date, name and all four sequence columns. */
  exists(row: ExerciseRow): Promise<boolean>;
  list(): Promise<StoredExerciseRow[]>;
}

const TABLE = 'exercises';

export class SupabaseExerciseLogStore implements ExerciseLogStore {
  constructor(private readonly client: SupabaseClient = getSupabase()) {}

  async insert(row: ExerciseRow): Promise<void> {
    const { error } = await this.client.from(TABLE).insert(row);
    if (error) throw new AppError('STORE_ERROR', `Insert failed: ${error.message}`);
  }

  async exists(row: ExerciseRow): Promise<boolean> {
    let query = this.client
      .from(TABLE)
      .select('id', { count: 'exact', head: true })
      .eq('date_completed', row.date_completed)
      .eq('exercise_name', row.exercise_name);
    // NULL never equals NULL in SQL, so absent sequences need an IS NULL filter
    for (const col of ['weight_left', 'weight_right', 'reps_left', 'reps_right'] as const) {
      const v = row[col];
      query = v === null ? query.is(col, null) : query.eq(col, v);
    }
    const { count, error } = await query;
    if (error) throw new AppError('STORE_ERROR', `Duplicate check failed: ${error.message}`);
    return (count ?? 0) > 0;
  }

  async list(): Promise<StoredExerciseRow[]> {
    const { data, error } = await this.client
      .from(TABLE)
      .select('*')
      .order('date_completed', { ascending: true });
    if (error) throw new AppError('STORE_ERROR', `List failed: ${error.message}`);
    return data ?? [];
  }
}
