import type { Dms, GeoCoordinate, Hemisphere, Rational } from "./types";

/**
 * Canonical decimal form produced by `String(number)`, including the
 * exponent notation used for very small and very large values.
 */
const DECIMAL_PATTERN = /^(-?)(\d+)(?:\.(\d+))?(?:e([+-]?\d+))?$/;

/**
 * Converts a signed decimal degree value into degrees, minutes and seconds.
 *
 * Degrees and minutes are truncated to integers, seconds are rounded to
 * five decimal places. A second that rounds up to 60 carries into the
 * minute. The hemisphere label is chosen by sign; a value of
 * exactly zero gets an empty label.
 *
 * @param value - Decimal degrees, e.g. -93.25
 * @param negativeLabel - Label for values below zero ("S" or "W")
 * @param positiveLabel - Label for values above zero ("N" or "E")
 *
 * @example
 * ```typescript
 * toDegreesMinutesSeconds(-93.25, "W", "E");
 * // { degree: 93, minute: 15, second: 0, hemisphere: "W" }
 * ```
 */
export function toDegreesMinutesSeconds(
  value: number,
  negativeLabel: Hemisphere,
  positiveLabel: Hemisphere,
): Dms {
  let hemisphere: Hemisphere = "";
  if (value < 0) {
    hemisphere = negativeLabel;
  } else if (value > 0) {
    hemisphere = positiveLabel;
  }

  const absolute = Math.abs(value);
  let degree = Math.trunc(absolute);
  const minutes = (absolute - degree) * 60;
  let minute = Math.trunc(minutes);
  let second = Number(((minutes - minute) * 60).toFixed(5));

  // float error can leave e.g. 10.1 at 5'59.9999999", which rounds to 60"
  if (second >= 60) {
    second = 0;
    minute++;
  }
  if (minute >= 60) {
    minute = 0;
    degree++;
  }

  return { degree, minute, second, hemisphere };
}

/**
 * Converts a number into the exact fraction of its decimal representation.
 *
 * The conversion goes through the number's decimal string, so `0.1`
 * becomes 1/10 rather than the fraction of its binary approximation.
 * The result is reduced to lowest terms with a positive denominator.
 *
 * @throws RangeError if the value is NaN or infinite
 *
 * @example
 * ```typescript
 * toRational(22.8); // { numerator: 114, denominator: 5 }
 * ```
 */
export function toRational(value: number): Rational {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot represent ${value} as a rational`);
  }

  const match = DECIMAL_PATTERN.exec(String(value));
  if (!match) {
    throw new RangeError(`Cannot represent ${value} as a rational`);
  }

  const [, sign, whole, fraction = "", exponent = "0"] = match;
  let numerator = BigInt(whole + fraction);
  let denominator = 10n ** BigInt(fraction.length);

  const shift = Number(exponent);
  if (shift > 0) {
    numerator *= 10n ** BigInt(shift);
  } else {
    denominator *= 10n ** BigInt(-shift);
  }

  const divisor = gcd(numerator, denominator);
  numerator /= divisor;
  denominator /= divisor;

  return {
    numerator: Number(sign === "-" ? -numerator : numerator),
    denominator: Number(denominator),
  };
}

function gcd(a: bigint, b: bigint): bigint {
  while (b !== 0n) {
    [a, b] = [b, a % b];
  }
  return a;
}

/**
 * Parses a `"lat,long"` string such as `"45.123,-123.12"`.
 *
 * @throws RangeError if the string is not two numbers, or either
 *   coordinate falls outside its valid range
 */
export function parseCoordinates(text: string): GeoCoordinate {
  const parts = text.split(",").map((part) => part.trim());
  if (parts.length !== 2) {
    throw new RangeError(
      `coordinates must be given as "lat,long", got "${text}"`,
    );
  }

  const [latitude, longitude] = parts.map((part) =>
    part === "" ? Number.NaN : Number(part),
  );
  if (
    latitude === undefined ||
    longitude === undefined ||
    !Number.isFinite(latitude) ||
    !Number.isFinite(longitude)
  ) {
    throw new RangeError(`coordinates are not numeric: "${text}"`);
  }

  if (latitude > 90 || latitude < -90) {
    throw new RangeError("latitude does not fall in the range (-90, 90)");
  }
  if (longitude > 180 || longitude < -180) {
    throw new RangeError("longitude does not fall in the range (-180, 180)");
  }

  return { latitude, longitude };
}
