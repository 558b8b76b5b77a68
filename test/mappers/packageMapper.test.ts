import { describe, expect, it, vi } from 'vitest';

import { ArityMismatchError, InvalidInputError } from '../../src/errors';
import { isWorkoutType, readPackage, WORKOUT_TYPES } from '../../src/mappers';
import { Running } from '../../src/models/Running';
import { SportsWalking } from '../../src/models/SportsWalking';
import { Swimming } from '../../src/models/Swimming';
import { Logger } from '../../src/utils/logger';

const quietLogger = new Logger({ debugEnabled: false, minLevel: 'error' });

describe('readPackage', () => {
  it('maps each type code to its workout class', () => {
    expect(readPackage('RUN', [15_000, 1, 75], quietLogger)).toBeInstanceOf(Running);
    expect(readPackage('WLK', [9000, 1, 75, 180], quietLogger)).toBeInstanceOf(SportsWalking);
    expect(readPackage('SWM', [720, 1, 80, 25, 40], quietLogger)).toBeInstanceOf(Swimming);
  });

  it('passes readings through in order', () => {
    const walking = readPackage('WLK', [9000, 1.5, 75, 180], quietLogger);
    expect(walking).toMatchObject({ action: 9000, duration: 1.5, height: 180, weight: 75 });
  });

  it('rejects an unknown type code', () => {
    expect(() => readPackage('BIKE', [1, 2, 3], quietLogger)).toThrow(InvalidInputError);
    expect(() => readPackage('BIKE', [1, 2, 3], quietLogger)).toThrow(
      'Unknown workout type "BIKE", expected one of RUN, SWM, WLK',
    );
  });

  it('matches type codes case-sensitively', () => {
    expect(() => readPackage('run', [15_000, 1, 75], quietLogger)).toThrow(InvalidInputError);
  });

  it('does not treat inherited object keys as type codes', () => {
    expect(() => readPackage('toString', [1, 2, 3], quietLogger)).toThrow(InvalidInputError);
  });

  it('rejects a text reading among numbers', () => {
    try {
      readPackage('RUN', [15_000, '1', 75], quietLogger);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error).toMatchObject({
        code: 'INVALID_INPUT',
        details: { index: 1, workoutType: 'RUN' },
        message: 'Reading 1 for RUN is not a number',
      });
    }
  });

  it('rejects NaN and null readings', () => {
    expect(() => readPackage('RUN', [Number.NaN, 1, 75], quietLogger)).toThrow(InvalidInputError);
    expect(() => readPackage('SWM', [720, 1, 80, null, 40], quietLogger)).toThrow(
      InvalidInputError,
    );
  });

  it('validates readings before checking their count', () => {
    expect(() => readPackage('RUN', ['fast'], quietLogger)).toThrow(InvalidInputError);
  });

  it('fails in construction when the reading count is wrong', () => {
    expect(() => readPackage('RUN', [15_000, 1], quietLogger)).toThrow(ArityMismatchError);
    expect(() => readPackage('SWM', [720, 1, 80, 25], quietLogger)).toThrow(
      'Swimming expects 5 readings, received 4',
    );
  });

  it('rejects a zero duration', () => {
    try {
      readPackage('RUN', [1000, 0, 70], quietLogger);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error).toMatchObject({
        details: { field: 'duration', workoutType: 'RUN' },
        message: 'duration must not be zero for RUN',
      });
    }
    expect(() => readPackage('SWM', [720, 0, 80, 25, 40], quietLogger)).toThrow(
      'duration must not be zero for SWM',
    );
  });

  it('rejects a zero height for race walking', () => {
    expect(() => readPackage('WLK', [9000, 1, 75, 0], quietLogger)).toThrow(
      'height must not be zero for WLK',
    );
  });

  it('reports the arity before a zero divisor', () => {
    expect(() => readPackage('RUN', [1000, 0], quietLogger)).toThrow(ArityMismatchError);
  });

  it('writes a dispatch debug entry when debug logging is on', () => {
    const log = new Logger({ debugEnabled: true, minLevel: 'error' });
    const debugLog = vi.spyOn(log, 'debugLog');

    readPackage('RUN', [15_000, 1, 75], log);

    expect(debugLog).toHaveBeenCalledWith('DISPATCH', 'Package mapped to workout', {
      readings: [15_000, 1, 75],
      trainingType: 'Running',
      workoutType: 'RUN',
    });
  });
});

describe('isWorkoutType', () => {
  it('accepts the three type codes only', () => {
    expect(WORKOUT_TYPES).toEqual(['RUN', 'SWM', 'WLK']);
    expect(isWorkoutType('SWM')).toBe(true);
    expect(isWorkoutType('BIKE')).toBe(false);
  });
});
