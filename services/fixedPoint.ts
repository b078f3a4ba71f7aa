import { DivisionByZeroError } from './errors';

export const FRACTION_DIGITS = 5;

const assertWhole = (value: number, label: string) => {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${label} must be a non-negative whole number, got ${value}`);
  }
};

// Exact floor division for non-negative safe integers; never goes through a fraction.
const intDiv = (a: number, b: number): number => (a - (a % b)) / b;

/**
 * Divides two non-negative integers and returns the quotient as a decimal
 * string with exactly `places` fractional digits, truncated rather than rounded.
 *
 * divide(10, 4) === "2.50000", divide(1, 3) === "0.33333"
 */
export const divide = (numerator: number, denominator: number, places: number = FRACTION_DIGITS): string => {
  assertWhole(numerator, 'numerator');
  assertWhole(denominator, 'denominator');
  assertWhole(places, 'places');
  if (denominator === 0) {
    throw new DivisionByZeroError(numerator);
  }

  const scale = 10 ** places;
  const scaledNumerator = numerator * scale;
  if (!Number.isSafeInteger(scaledNumerator)) {
    throw new RangeError(`numerator ${numerator} is too large for ${places} fractional digits`);
  }

  const scaled = intDiv(scaledNumerator, denominator);
  const whole = intDiv(scaled, scale);
  if (places === 0) return String(whole);

  const fraction = String(scaled - whole * scale).padStart(places, '0');
  return `${whole}.${fraction}`;
};
