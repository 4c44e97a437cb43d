/** Whole cents. Prices never pass through binary floating point arithmetic. */
export type Cents = number;

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d+))?$/;

/**
 * Parses a decimal amount ("35", "29.75", 12.5) into hundredths, rounding half-up
 * on the third fractional digit. Works on the decimal text, so 0.1 + 0.2 style drift
 * in a numeric input is cut off at the string boundary.
 */
export function toCents(value: string | number): Cents {
  const text = typeof value === 'number' ? numberToPlainString(value) : value.trim();
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new RangeError(`not a decimal amount: ${String(value)}`);
  }

  const [, sign, whole, fraction = ''] = match;
  const padded = `${fraction}000`;
  let cents = Number(whole) * 100 + Number(padded.slice(0, 2));
  if (Number(padded[2]) >= 5) {
    cents += 1;
  }

  if (!Number.isSafeInteger(cents)) {
    throw new RangeError(`amount out of range: ${String(value)}`);
  }

  return sign && cents !== 0 ? -cents : cents;
}

function numberToPlainString(value: number): string {
  if (!Number.isFinite(value)) {
    throw new RangeError(`not a finite amount: ${value}`);
  }

  // toFixed keeps more digits than any stored amount has and never uses exponent notation
  return value.toFixed(6);
}

export function fromCents(cents: Cents): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}

/** `numerator / denominator`, rounded half-up. Both sides are non-negative integers. */
export function divideRoundHalfUp(numerator: number, denominator: number): number {
  return Math.floor((numerator * 2 + denominator) / (denominator * 2));
}

/**
 * Applies a percentage discount held in hundredths of a percent (1500 = 15%).
 * The result is rounded to the cent, half-up.
 */
export function applyPercentDiscount(amount: Cents, percentHundredths: number): Cents {
  const keptHundredths = 10_000 - percentHundredths;
  return divideRoundHalfUp(amount * keptHundredths, 10_000);
}

export function sumCents(amounts: readonly Cents[]): Cents {
  return amounts.reduce((total, amount) => total + amount, 0);
}
