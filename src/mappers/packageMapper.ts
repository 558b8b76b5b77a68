/**
 * Sensor package transformation.
 * Maps a workout type code and raw readings to the matching workout class.
 */

import { InvalidInputError } from '../errors';
import { Running } from '../models/Running';
import { SportsWalking } from '../models/SportsWalking';
import { Swimming } from '../models/Swimming';
import { logger as defaultLogger } from '../utils/logger';
import { ReadingsSchema } from '../validation/schemas';

import type { Training } from '../models/Training';
import type { WorkoutType } from '../types';
import type { Logger } from '../utils/logger';

type TrainingFactory = (readings: readonly number[]) => Training;

const TRAINING_FACTORIES: Record<WorkoutType, TrainingFactory> = {
  RUN: (readings) => Running.fromReadings(readings),
  SWM: (readings) => Swimming.fromReadings(readings),
  WLK: (readings) => SportsWalking.fromReadings(readings),
};

export const WORKOUT_TYPES = Object.keys(TRAINING_FACTORIES);

export function isWorkoutType(value: string): value is WorkoutType {
  return Object.hasOwn(TRAINING_FACTORIES, value);
}

/**
 * Read a package received from the sensor unit.
 *
 * The type code and the readings are validated before anything is built.
 * Readings are then assigned positionally to the fields of the workout, so a
 * wrong reading count fails in the workout constructor. A zero reading that a
 * metric divides by is rejected once the workout is built.
 *
 * @throws InvalidInputError for an unknown type code, a non-numeric reading or a zero divisor
 * @throws ArityMismatchError when the reading count does not match the workout
 */
export function readPackage(
  workoutType: string,
  data: readonly unknown[],
  log: Logger = defaultLogger,
): Training {
  if (!isWorkoutType(workoutType)) {
    throw new InvalidInputError(
      `Unknown workout type "${workoutType}", expected one of ${WORKOUT_TYPES.join(', ')}`,
      { workoutType },
    );
  }

  const parsed = ReadingsSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const index = typeof issue.path[0] === 'number' ? issue.path[0] : undefined;
    log.debugLog('VALIDATION', 'Non-numeric reading', { data, issues: parsed.error.issues });
    throw new InvalidInputError(
      index === undefined
        ? `Readings for ${workoutType} must be numbers`
        : `Reading ${String(index)} for ${workoutType} is not a number`,
      { index, workoutType },
    );
  }

  const training = TRAINING_FACTORIES[workoutType](parsed.data);

  const zeroDivisor = training.findZeroDivisor();
  if (zeroDivisor !== undefined) {
    log.debugLog('VALIDATION', 'Zero divisor reading', { data, field: zeroDivisor });
    throw new InvalidInputError(`${zeroDivisor} must not be zero for ${workoutType}`, {
      field: zeroDivisor,
      workoutType,
    });
  }

  log.debugLog('DISPATCH', 'Package mapped to workout', {
    readings: parsed.data,
    trainingType: training.trainingType,
    workoutType,
  });

  return training;
}
