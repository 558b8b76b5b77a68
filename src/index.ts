/**
 * Library entry point: workout classes, package reading and formatting.
 */

export {
  ArityMismatchError,
  InvalidInputError,
  isInputError,
  NotImplementedDefect,
  WorkoutError,
} from './errors';
export type { WorkoutErrorCode } from './errors';
export { formatInfoMessage } from './formatters/infoMessage';
export { isWorkoutType, readPackage, WORKOUT_TYPES } from './mappers';
export { InfoMessage } from './models/InfoMessage';
export { Running } from './models/Running';
export { SportsWalking } from './models/SportsWalking';
export { Swimming } from './models/Swimming';
export { M_IN_KM, MIN_IN_H, Training } from './models/Training';
export { summarizePackage, summarizePackages } from './services/summaryService';
export type * from './types';
