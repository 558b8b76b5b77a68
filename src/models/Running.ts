import { assertArity, M_IN_KM, MIN_IN_H, Training } from './Training';

import type { TrainingTypeLabel } from '../types';

const CALORIES_MEAN_SPEED_MULTIPLIER = 18;
const CALORIES_MEAN_SPEED_SHIFT = 20;

export class Running extends Training {
  static readonly FIELDS = ['action', 'duration', 'weight'] as const;

  readonly trainingType: TrainingTypeLabel = 'Running';

  static fromReadings(readings: readonly number[]): Running {
    assertArity('Running', Running.FIELDS, readings);
    const [action, duration, weight] = readings;
    return new Running(action, duration, weight);
  }

  // Not clamped: low speeds give a negative result.
  override getSpentCalories(): number {
    const speedFactor =
      CALORIES_MEAN_SPEED_MULTIPLIER * this.getMeanSpeed() - CALORIES_MEAN_SPEED_SHIFT;
    return ((speedFactor * this.weight) / M_IN_KM) * (this.duration * MIN_IN_H);
  }
}
