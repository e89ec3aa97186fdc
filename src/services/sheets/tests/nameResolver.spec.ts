import { resolveExerciseName, resolveExerciseNames } from '../nameResolver';

describe('resolveExerciseName', () => {
  it('cuts at the delimiter before merged handwriting', () => {
    expect(resolveExerciseName('Goblet Squat - 35# x 12')).toBe('Goblet Squat');
  });

  it('cuts at the delimiter before a side header', () => {
    expect(resolveExerciseName('Split Squat - L - 20# x 10 R - 20# x 10')).toBe('Split Squat');
  });

  it('cuts at the first digit when there is no delimiter', () => {
    expect(resolveExerciseName('Bench Press 3x10')).toBe('Bench Press');
  });

  it('returns the whole trimmed line when nothing was merged', () => {
    expect(resolveExerciseName('  Dead Bug ')).toBe('Dead Bug');
  });

  it('uses the nearest delimiter before the match', () => {
    expect(resolveExerciseName('Row - Cable - 50# x 10')).toBe('Row - Cable');
  });
});

describe('resolveExerciseNames', () => {
  it('skips the title and blank lines', () => {
    const page = 'Upper Day\n\nGoblet Squat - 35# x 12\r\n  Plank  \n';
    expect(resolveExerciseNames(page)).toEqual(['Goblet Squat', 'Plank']);
  });

  it('returns nothing for an empty page', () => {
    expect(resolveExerciseNames('')).toEqual([]);
  });
});
