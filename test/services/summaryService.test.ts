import { afterEach, describe, expect, it, vi } from 'vitest';

import { NotImplementedDefect } from '../../src/errors';
import { Running } from '../../src/models/Running';
import { summarizePackage, summarizePackages } from '../../src/services/summaryService';
import { Logger } from '../../src/utils/logger';

const quietLogger = new Logger({ debugEnabled: false, minLevel: 'error' });

describe('summarizePackage', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the report and message for a valid package', () => {
    const result = summarizePackage(
      { data: [720, 1, 80, 25, 40], workoutType: 'SWM' },
      0,
      quietLogger,
    );

    expect(result).toEqual({
      index: 0,
      message:
        'Тип тренировки: Swimming; Длительность: 1.000 ч.; Дистанция: 0.994 км; ' +
        'Ср. скорость: 1.000 км/ч; Потрачено ккал: 336.000.',
      report: {
        calories: expect.closeTo(336, 9),
        distance: expect.closeTo(0.9936, 12),
        duration: 1,
        speed: 1,
        trainingType: 'Swimming',
      },
      success: true,
      workoutType: 'SWM',
    });
  });

  it('turns an unknown type code into a failed result', () => {
    const result = summarizePackage({ data: [1, 2, 3], workoutType: 'BIKE' }, 3, quietLogger);

    expect(result).toEqual({
      error: {
        code: 'INVALID_INPUT',
        message: 'Unknown workout type "BIKE", expected one of RUN, SWM, WLK',
      },
      index: 3,
      success: false,
      workoutType: 'BIKE',
    });
  });

  it('turns a wrong reading count into a failed result', () => {
    const result = summarizePackage({ data: [9000, 1, 75], workoutType: 'WLK' }, 1, quietLogger);

    expect(result).toEqual({
      error: {
        code: 'ARITY_MISMATCH',
        message: 'SportsWalking expects 4 readings, received 3',
      },
      index: 1,
      success: false,
      workoutType: 'WLK',
    });
  });

  it('turns a zero duration into a failed result', () => {
    const result = summarizePackage({ data: [1000, 0, 70], workoutType: 'RUN' }, 0, quietLogger);

    expect(result).toEqual({
      error: { code: 'INVALID_INPUT', message: 'duration must not be zero for RUN' },
      index: 0,
      success: false,
      workoutType: 'RUN',
    });
  });

  it('rethrows defects instead of reporting them as bad input', () => {
    vi.spyOn(Running.prototype, 'getSpentCalories').mockImplementation(() => {
      throw new NotImplementedDefect('Running');
    });

    expect(() =>
      summarizePackage({ data: [15_000, 1, 75], workoutType: 'RUN' }, 0, quietLogger),
    ).toThrow(NotImplementedDefect);
  });
});

describe('summarizePackages', () => {
  it('keeps input order and isolates failures', () => {
    const summary = summarizePackages(
      [
        { data: [720, 1, 80, 25, 40], workoutType: 'SWM' },
        { data: [15_000, 'x', 75], workoutType: 'RUN' },
        { data: [15_000, 1, 75], workoutType: 'RUN' },
        { data: [9000, 1, 75, 180], workoutType: 'WLK' },
      ],
      quietLogger,
    );

    expect(summary.succeeded).toBe(3);
    expect(summary.failed).toBe(1);
    expect(summary.results.map((result) => result.index)).toEqual([0, 1, 2, 3]);
    expect(summary.results.map((result) => result.success)).toEqual([true, false, true, true]);
    expect(summary.results[1]).toMatchObject({
      error: { code: 'INVALID_INPUT', message: 'Reading 1 for RUN is not a number' },
    });
    expect(summary.results[2]).toMatchObject({
      message:
        'Тип тренировки: Running; Длительность: 1.000 ч.; Дистанция: 9.750 км; ' +
        'Ср. скорость: 9.750 км/ч; Потрачено ккал: 699.750.',
    });
    expect(summary.results[3]).toMatchObject({
      message:
        'Тип тренировки: SportsWalking; Длительность: 1.000 ч.; Дистанция: 5.850 км; ' +
        'Ср. скорость: 5.850 км/ч; Потрачено ккал: 157.500.',
    });
  });

  it('returns an empty summary for no packages', () => {
    expect(summarizePackages([], quietLogger)).toEqual({ failed: 0, results: [], succeeded: 0 });
  });
});
