import { z } from 'zod';

import { SummaryConfig } from '../config';

// Sensor readings must all be numbers; NaN is rejected by z.number()
export const ReadingsSchema = z.array(z.number());

// One raw package - readings are checked later, per package
const WorkoutPackageSchema = z.object({
  workoutType: z.string(),
  data: z.array(z.unknown()),
});

// Batch summary request body
export const SummaryRequestSchema = z.object({
  packages: z.array(WorkoutPackageSchema).min(1).max(SummaryConfig.maxBatchSize),
});

export type ValidatedSummaryRequest = z.infer<typeof SummaryRequestSchema>;
