import { assertArity, M_IN_KM, Training } from './Training';

import type { TrainingTypeLabel } from '../types';

const CALORIES_MEAN_SPEED_SHIFT = 1.1;
const CALORIES_WEIGHT_MULTIPLIER = 2;

/**
 * Pool swimming. Pool length is in meters.
 *
 * Mean speed comes from pool length and lap count, while distance is still
 * derived from the stroke count, so distance / duration differs from speed.
 */
export class Swimming extends Training {
  static readonly FIELDS = ['action', 'duration', 'weight', 'poolLength', 'lapCount'] as const;

  override readonly strideLengthKm: number = 1.38;

  readonly trainingType: TrainingTypeLabel = 'Swimming';

  constructor(
    action: number,
    duration: number,
    weight: number,
    readonly poolLength: number,
    readonly lapCount: number,
  ) {
    super(action, duration, weight);
  }

  static fromReadings(readings: readonly number[]): Swimming {
    assertArity('Swimming', Swimming.FIELDS, readings);
    const [action, duration, weight, poolLength, lapCount] = readings;
    return new Swimming(action, duration, weight, poolLength, lapCount);
  }

  override getMeanSpeed(): number {
    return (this.poolLength * this.lapCount) / M_IN_KM / this.duration;
  }

  override getSpentCalories(): number {
    return (
      (this.getMeanSpeed() + CALORIES_MEAN_SPEED_SHIFT) * CALORIES_WEIGHT_MULTIPLIER * this.weight
    );
  }
}
