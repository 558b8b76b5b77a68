/**
 * Centralized type exports.
 * All type definitions are exported from this index for consistent imports.
 */

export type {
  BatchSummary,
  PackageFailure,
  PackageResult,
  TrainingSummary,
  TrainingTypeLabel,
  WorkoutPackage,
  WorkoutType,
} from './workout';
