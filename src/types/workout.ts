/**
 * Workout type definitions.
 * Types for sensor packages and the summaries computed from them.
 */

/**
 * Short codes sent by the sensor unit for each supported workout.
 */
export type WorkoutType = 'RUN' | 'SWM' | 'WLK';

/**
 * Stable label printed in the info message for each workout variant.
 */
export type TrainingTypeLabel = 'Running' | 'SportsWalking' | 'Swimming';

/**
 * Raw package as it arrives from the sensor unit: a type code and the
 * positional readings for that workout. Nothing is validated yet.
 */
export interface WorkoutPackage {
  data: readonly unknown[];
  workoutType: string;
}

/**
 * Summary of a finished workout. Durations are in hours, distances in km,
 * speeds in km/h and energy in kcal.
 */
export interface TrainingSummary {
  calories: number;
  distance: number;
  duration: number;
  speed: number;
  trainingType: string;
}

export interface PackageFailure {
  code: string;
  message: string;
}

/**
 * Outcome for one package of a batch. Exactly one of report/error is set.
 */
export type PackageResult =
  | {
      index: number;
      message: string;
      report: TrainingSummary;
      success: true;
      workoutType: string;
    }
  | {
      error: PackageFailure;
      index: number;
      success: false;
      workoutType: string;
    };

export interface BatchSummary {
  failed: number;
  results: PackageResult[];
  succeeded: number;
}
