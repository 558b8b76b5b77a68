import { HttpStatus } from '../config';
import { summarizePackages } from '../services/summaryService';
import { SummaryRequestSchema } from '../validation/schemas';

import type { Logger } from '../utils/logger';

/**
 * Subset of the express request the controller reads.
 */
export interface SummaryRequest {
  body: unknown;
  log: Logger;
}

/**
 * Subset of the express response the controller writes.
 */
export interface JsonResponder {
  status(code: number): { json(body: unknown): unknown };
}

export const summarizeWorkouts = (req: SummaryRequest, res: JsonResponder): void => {
  const { log } = req;
  const timer = log.startTimer('summarizeWorkouts');

  try {
    const parseResult = SummaryRequestSchema.safeParse(req.body);
    if (!parseResult.success) {
      log.warn('Invalid request body', { errors: parseResult.error.issues });
      res.status(HttpStatus.BAD_REQUEST).json({
        error: 'Invalid request format',
        details: parseResult.error.issues,
      });
      return;
    }

    const { packages } = parseResult.data;
    log.info('Processing summary request', { packageCount: packages.length });

    const summary = summarizePackages(packages, log);

    let status: number = HttpStatus.OK;
    if (summary.succeeded === 0) {
      status = HttpStatus.UNPROCESSABLE_ENTITY;
    } else if (summary.failed > 0) {
      status = HttpStatus.MULTI_STATUS;
    }

    timer.end(summary.failed > 0 ? 'warn' : 'info', 'Summary completed', {
      failed: summary.failed,
      succeeded: summary.succeeded,
    });

    res.status(status).json({ results: summary.results });
  } catch (error) {
    log.error('Failed to summarize workouts', error);
    timer.end('error', 'Summary request failed');
    res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      error: 'Failed to process request',
      message: error instanceof Error ? error.message : 'An error occurred',
    });
  }
};
