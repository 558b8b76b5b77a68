// Largest fraction digit count Number.prototype.toFixed accepts
const EXACT_FRACTION_DIGITS = 100;

/**
 * Format a number with a fixed count of decimal places, rounding exact ties
 * half-to-even (0.0625 -> "0.062", 0.1875 -> "0.188").
 *
 * toFixed rounds ties away from zero. A tie is only possible when the binary
 * value terminates exactly one digit past the requested precision with a 5,
 * so the exact expansion from toFixed(100) is enough to detect it.
 */
export function formatFixed(value: number, digits: number): string {
  const rounded = value.toFixed(digits);
  // toFixed switches to exponent notation from 1e21
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return rounded;

  const [integerPart, fraction = ''] = Math.abs(value).toFixed(EXACT_FRACTION_DIGITS).split('.');
  const tail = fraction.slice(digits);
  const isTie = tail.startsWith('5') && /^0*$/.test(tail.slice(1));
  if (!isTie) return rounded;

  const kept = fraction.slice(0, digits);
  const lastDigit = Number((integerPart + kept).at(-1));
  if (lastDigit % 2 !== 0) return rounded;

  const sign = value < 0 ? '-' : '';
  return digits > 0 ? `${sign}${integerPart}.${kept}` : `${sign}${integerPart}`;
}
