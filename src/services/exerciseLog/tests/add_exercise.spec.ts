import { logger } from '@/lib/logger';
import { addExercise, listExercises, parseArgs } from '../tools/add_exercise';
import { InMemoryExerciseLogStore } from './memoryStore';

describe('parseArgs', () => {
  it('reads a unilateral add with multi-word values', () => {
    const argv = ['add', '--date', '2024-03-05', '--body-part', 'Upper', 'Back', '--name', 'Seated Row',
      '--laterality', 'unilateral', '--sets', '2', '--weight', '50', '55', '--reps', '12', '10'];
    expect(parseArgs(argv)).toEqual({
      kind: 'add',
      entry: {
        date_completed: '2024-03-05',
        body_part: 'Upper Back',
        exercise_name: 'Seated Row',
        laterality: 'unilateral',
        sets: 2,
        weights: [50, 55],
        reps: [12, 10],
      },
    });
  });

  it('reads the four bilateral sequences', () => {
    const command = parseArgs(['add', '--date', '2024-03-05', '--body-part', 'Quads', '--name', 'Split Squat',
      '--laterality', 'bilateral', '--sets', '1', '--weight-left', '20', '--weight-right', '25',
      '--reps-left', '10', '--reps-right', '8']);
    expect(command?.kind === 'add' && command.entry).toMatchObject({
      weights_left: [20],
      weights_right: [25],
      reps_left: [10],
      reps_right: [8],
    });
  });

  it('reads list', () => {
    expect(parseArgs(['list'])).toEqual({ kind: 'list' });
  });

  it('rejects unknown commands and missing required flags', () => {
    expect(parseArgs([])).toBeNull();
    expect(parseArgs(['remove'])).toBeNull();
    expect(parseArgs(['list', 'all'])).toBeNull();
    expect(parseArgs(['add', '--date', '2024-03-05', '--name', 'Row'])).toBeNull();
    expect(parseArgs(['add', 'Row'])).toBeNull();
  });

  it('rejects non-numeric set values', () => {
    const argv = ['add', '--date', '2024-03-05', '--body-part', 'Chest', '--name', 'Bench',
      '--laterality', 'unilateral', '--sets', '1', '--weight', 'heavy', '--reps', '5'];
    expect(() => parseArgs(argv)).toThrow('--weight takes whole numbers, got "heavy"');
  });
});

describe('addExercise', () => {
  it('validates and stores the entry', async () => {
    const store = new InMemoryExerciseLogStore();
    const command = parseArgs(['add', '--date', '03/05/2024', '--body-part', 'Chest', '--name', 'Bench', 'Press',
      '--laterality', 'unilateral', '--sets', '2', '--weight', '90', '90', '--reps', '10', '8']);
    if (command?.kind !== 'add') throw new Error('expected an add command');

    await addExercise(store, command.entry);

    expect(store.rows).toEqual([
      {
        id: 1,
        date_completed: '2024-03-05',
        body_part: 'Chest',
        exercise_name: 'Bench Press',
        laterality: 'unilateral',
        sets: 2,
        weight_left: '90,90',
        weight_right: null,
        reps_left: '10,8',
        reps_right: null,
      },
    ]);
  });

  it('stores nothing when validation fails', async () => {
    const store = new InMemoryExerciseLogStore();
    await expect(
      addExercise(store, {
        date_completed: '2024-03-05',
        body_part: 'Chest',
        exercise_name: 'Bench',
        laterality: 'bilateral',
        sets: 1,
        weights_left: [90],
        reps_left: [10],
        reps_right: [10],
      })
    ).rejects.toThrow('Bilateral exercises require --weight-right');
    expect(store.rows).toEqual([]);
  });
});

describe('listExercises', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints one line per stored row', async () => {
    const info = vi.spyOn(logger, 'info');
    const store = new InMemoryExerciseLogStore();
    await addExercise(store, {
      date_completed: '2024-03-05',
      body_part: 'Core',
      exercise_name: 'Plank',
      laterality: 'unilateral',
      sets: 1,
      weights: [0],
      reps: [60],
    });
    info.mockClear();

    const rows = await listExercises(store);

    expect(rows).toHaveLength(1);
    expect(info).toHaveBeenCalledTimes(1);
    expect(info).toHaveBeenCalledWith('1 | 2024-03-05 | Core | Plank | unilateral | 1 | 0 | - | 60 | -');
  });
});
