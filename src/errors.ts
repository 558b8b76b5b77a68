/**
 * Error types raised while reading sensor packages and computing workouts.
 */

export type WorkoutErrorCode = 'ARITY_MISMATCH' | 'INVALID_INPUT' | 'NOT_IMPLEMENTED';

export abstract class WorkoutError extends Error {
  abstract readonly code: WorkoutErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Unknown workout type code, a reading that is not a number, or a zero
 * reading that a metric divides by.
 */
export class InvalidInputError extends WorkoutError {
  readonly code = 'INVALID_INPUT';

  constructor(
    message: string,
    readonly details: { field?: string; index?: number; workoutType: string },
  ) {
    super(message);
  }
}

/**
 * Reading count does not match the fields the workout declares.
 */
export class ArityMismatchError extends WorkoutError {
  readonly code = 'ARITY_MISMATCH';

  constructor(
    readonly trainingType: string,
    readonly expected: number,
    readonly received: number,
  ) {
    super(
      `${trainingType} expects ${String(expected)} readings, received ${String(received)}`,
    );
  }
}

/**
 * A workout class that never supplied its calorie formula. This is a wiring
 * bug, not bad input, and is never converted into a per-package failure.
 */
export class NotImplementedDefect extends WorkoutError {
  readonly code = 'NOT_IMPLEMENTED';

  constructor(trainingType: string) {
    super(`getSpentCalories is not implemented for ${trainingType}`);
  }
}

/**
 * Errors caused by the package contents, as opposed to programming errors.
 */
export function isInputError(error: unknown): error is ArityMismatchError | InvalidInputError {
  return error instanceof InvalidInputError || error instanceof ArityMismatchError;
}
