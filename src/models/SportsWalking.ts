import { assertArity, MIN_IN_H, Training } from './Training';

import type { TrainingTypeLabel } from '../types';

const CALORIES_WEIGHT_MULTIPLIER = 0.035;
const CALORIES_SPEED_HEIGHT_MULTIPLIER = 0.029;
const SPEED_EXPONENT = 2;

/**
 * Race walking. Height is in cm.
 */
export class SportsWalking extends Training {
  static readonly FIELDS = ['action', 'duration', 'weight', 'height'] as const;

  readonly trainingType: TrainingTypeLabel = 'SportsWalking';

  constructor(
    action: number,
    duration: number,
    weight: number,
    readonly height: number,
  ) {
    super(action, duration, weight);
  }

  static fromReadings(readings: readonly number[]): SportsWalking {
    assertArity('SportsWalking', SportsWalking.FIELDS, readings);
    const [action, duration, weight, height] = readings;
    return new SportsWalking(action, duration, weight, height);
  }

  override findZeroDivisor(): string | undefined {
    return super.findZeroDivisor() ?? (this.height === 0 ? 'height' : undefined);
  }

  override getSpentCalories(): number {
    // Squared speed over height is floor-divided, not a real division.
    const speedHeightRatio = Math.floor(this.getMeanSpeed() ** SPEED_EXPONENT / this.height);
    return (
      (CALORIES_WEIGHT_MULTIPLIER * this.weight +
        speedHeightRatio * CALORIES_SPEED_HEIGHT_MULTIPLIER * this.weight) *
      (this.duration * MIN_IN_H)
    );
  }
}
