import { formatInfoMessage } from '../formatters/infoMessage';

import type { TrainingSummary } from '../types';

/**
 * Read-only summary of a finished workout, ready to be rendered.
 */
export class InfoMessage implements TrainingSummary {
  readonly calories: number;
  readonly distance: number;
  readonly duration: number;
  readonly speed: number;
  readonly trainingType: string;

  constructor(summary: TrainingSummary) {
    this.calories = summary.calories;
    this.distance = summary.distance;
    this.duration = summary.duration;
    this.speed = summary.speed;
    this.trainingType = summary.trainingType;
  }

  getMessage(): string {
    return formatInfoMessage(this);
  }

  toJSON(): TrainingSummary {
    return {
      calories: this.calories,
      distance: this.distance,
      duration: this.duration,
      speed: this.speed,
      trainingType: this.trainingType,
    };
  }
}
