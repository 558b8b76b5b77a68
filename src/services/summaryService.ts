import { isInputError } from '../errors';
import { readPackage } from '../mappers';
import { logger as defaultLogger } from '../utils/logger';

import type { BatchSummary, PackageResult, WorkoutPackage } from '../types';
import type { Logger } from '../utils/logger';

/**
 * Summarize a single package.
 * Bad input becomes a failed result; any other error is rethrown.
 */
export function summarizePackage(
  pkg: WorkoutPackage,
  index: number,
  log: Logger = defaultLogger,
): PackageResult {
  try {
    const info = readPackage(pkg.workoutType, pkg.data, log).showTrainingInfo();
    return {
      index,
      message: info.getMessage(),
      report: info.toJSON(),
      success: true,
      workoutType: pkg.workoutType,
    };
  } catch (error) {
    if (!isInputError(error)) throw error;

    log.warn('Package rejected', {
      code: error.code,
      error: error.message,
      index,
      workoutType: pkg.workoutType,
    });
    return {
      error: { code: error.code, message: error.message },
      index,
      success: false,
      workoutType: pkg.workoutType,
    };
  }
}

/**
 * Summarize packages in input order. Packages are independent, so one bad
 * package does not stop the rest of the batch.
 */
export function summarizePackages(
  packages: readonly WorkoutPackage[],
  log: Logger = defaultLogger,
): BatchSummary {
  const results = packages.map((pkg, index) => summarizePackage(pkg, index, log));
  const succeeded = results.filter((result) => result.success).length;

  log.debugLog('TRANSFORM', 'Packages summarized', {
    failed: results.length - succeeded,
    succeeded,
    total: results.length,
  });

  return {
    failed: results.length - succeeded,
    results,
    succeeded,
  };
}
