import { AppError } from '@/lib/errors';
import { logger } from '@/lib/logger';
import { pairBoxes, parseSheet } from '../index';

describe('parseSheet', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('parses every box in sheet order and gathers warnings', () => {
    const warn = vi.spyOn(logger, 'warn');
    const { records, warnings } = parseSheet([
      { exercise_name: 'Bench Press', text: '90# x 10, 8' },
      { exercise_name: 'Split Squat', text: 'L - 20# x 10, 8 R - 20# x 10' },
      { exercise_name: 'Plank', text: '60, 45' },
    ]);

    expect(records.map(r => [r.exercise_name, r.sets])).toEqual([
      ['Bench Press', 2],
      ['Split Squat', 2],
      ['Plank', 2],
    ]);
    expect(warnings).toEqual([
      { box_text: 'L - 20# x 10, 8 R - 20# x 10', token: '2:1', reason: 'side_count_mismatch' },
    ]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("⚠️ side_count_mismatch: token '2:1' in 'L - 20# x 10, 8 R - 20# x 10'");
  });

  it('skips a box without an exercise name and keeps the rest', () => {
    const error = vi.spyOn(logger, 'error');
    const { records, rejected } = parseSheet([
      { exercise_name: 'Row', text: '50# x 10' },
      { exercise_name: '', text: '20, 20' },
      { exercise_name: 'Curl', text: '25# x 12' },
    ]);
    expect(records.map(r => r.exercise_name)).toEqual(['Row', 'Curl']);
    expect(rejected).toEqual([{ exercise_name: '', text: '20, 20' }]);
    expect(error).toHaveBeenCalledWith('❌ Skipping box \'20, 20\': Box "20, 20" has no exercise name');
  });

  it('gives the same record for a box regardless of its neighbours', () => {
    const box = { exercise_name: 'Curl', text: '25# x 12, 10' };
    const alone = parseSheet([box]).records[0];
    const withOthers = parseSheet([{ exercise_name: 'Row', text: '1111' }, box]).records[1];
    expect(withOthers).toEqual(alone);
  });
});

describe('pairBoxes', () => {
  it('zips names with box texts', () => {
    expect(pairBoxes(['Row', 'Curl'], ['10', '12'])).toEqual([
      { exercise_name: 'Row', text: '10' },
      { exercise_name: 'Curl', text: '12' },
    ]);
  });

  it('refuses mismatched counts', () => {
    expect(() => pairBoxes(['Row'], ['10', '12'])).toThrow(AppError);
    expect(() => pairBoxes(['Row'], ['10', '12'])).toThrow('Sheet lists 1 exercises but 2 boxes were read');
  });
});
