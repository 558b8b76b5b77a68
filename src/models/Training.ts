import { ArityMismatchError, NotImplementedDefect } from '../errors';
import { InfoMessage } from './InfoMessage';

/** Meters in a kilometer. */
export const M_IN_KM = 1000;

/** Minutes in an hour. */
export const MIN_IN_H = 60;

/**
 * Check the reading count against the fields a workout declares.
 *
 * @throws ArityMismatchError when the counts differ
 */
export function assertArity(
  trainingType: string,
  fields: readonly string[],
  readings: readonly number[],
): void {
  if (readings.length !== fields.length) {
    throw new ArityMismatchError(trainingType, fields.length, readings.length);
  }
}

/**
 * Base workout computed from sensor readings.
 *
 * Distance and mean speed are derived from `action` (steps or strokes) and the
 * stride length of the variant. Every variant has to supply its own calorie
 * formula. Instances are immutable and metrics are computed on every call.
 */
export abstract class Training {
  /** Label printed in the info message. */
  abstract readonly trainingType: string;

  /** Kilometers covered by one step or stroke. */
  readonly strideLengthKm: number = 0.65;

  constructor(
    readonly action: number,
    readonly duration: number,
    readonly weight: number,
  ) {}

  /** Distance in km. */
  getDistance(): number {
    return (this.action * this.strideLengthKm) / M_IN_KM;
  }

  /**
   * Name of the first reading that a metric divides by and that is zero.
   */
  findZeroDivisor(): string | undefined {
    return this.duration === 0 ? 'duration' : undefined;
  }

  /** Mean speed in km/h. */
  getMeanSpeed(): number {
    return this.getDistance() / this.duration;
  }

  /**
   * Energy spent in kcal. Variants override this; reaching the base
   * implementation means a variant was wired without its formula.
   */
  getSpentCalories(): number {
    throw new NotImplementedDefect(this.trainingType);
  }

  showTrainingInfo(): InfoMessage {
    return new InfoMessage({
      calories: this.getSpentCalories(),
      distance: this.getDistance(),
      duration: this.duration,
      speed: this.getMeanSpeed(),
      trainingType: this.trainingType,
    });
  }
}
