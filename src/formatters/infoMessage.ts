/**
 * Info message formatter.
 * Renders a workout summary as the single line shown to the user.
 */

import { SummaryConfig } from '../config';
import { formatFixed } from '../utils/numberUtilities';

import type { TrainingSummary } from '../types';

/**
 * Render a summary, every number with a fixed count of decimal places.
 * Exact ties round half-to-even.
 *
 * @example
 * formatInfoMessage({ trainingType: 'Swimming', duration: 1, distance: 0.9936, speed: 1, calories: 336 })
 * // 'Тип тренировки: Swimming; Длительность: 1.000 ч.; Дистанция: 0.994 км; Ср. скорость: 1.000 км/ч; Потрачено ккал: 336.000.'
 */
export function formatInfoMessage(
  summary: TrainingSummary,
  decimalPlaces: number = SummaryConfig.decimalPlaces,
): string {
  const fixed = (value: number) => formatFixed(value, decimalPlaces);

  return [
    `Тип тренировки: ${summary.trainingType}`,
    `Длительность: ${fixed(summary.duration)} ч.`,
    `Дистанция: ${fixed(summary.distance)} км`,
    `Ср. скорость: ${fixed(summary.speed)} км/ч`,
    `Потрачено ккал: ${fixed(summary.calories)}.`,
  ].join('; ');
}
