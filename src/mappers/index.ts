/**
 * Data mapper exports.
 * Functions for turning raw sensor packages into workout objects.
 */

export { isWorkoutType, readPackage, WORKOUT_TYPES } from './packageMapper';
