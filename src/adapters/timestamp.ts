/**
 * ISO-8601 timestamp normalization without a date library.
 *
 * Accepts the shapes transcripts actually contain:
 *   2026-02-25T08:16:18.720Z
 *   2026-02-25T08:16:18.720+00:00
 *   2026-02-25T03:16:18-05:00
 * and returns epoch seconds (UTC), or null when the value cannot be read.
 */

const INTEGER = /^[+-]?\d+$/;
const DIGITS = /^\d+$/;

const SECONDS_PER_DAY = 86_400;

// Days from 0000-03-01 to 1970-01-01.
const EPOCH_SHIFT = 719_468;
const DAYS_PER_ERA = 146_097;

function parseInteger(value: string | undefined): number | null {
  if (value === undefined || !INTEGER.test(value)) return null;
  return Number.parseInt(value, 10);
}

/**
 * Days since 1970-01-01 for a proleptic Gregorian date.
 *
 * Years are counted from March so the leap day falls at the end of the
 * year; January and February belong to the previous year. 400-year eras
 * use floor division so negative years land in the right era.
 */
export function daysFromCivil(year: number, month: number, day: number): number {
  const y = month <= 2 ? year - 1 : year;
  const m = month <= 2 ? month + 9 : month - 3; // March = 0

  const era = Math.floor(y / 400);
  const yearOfEra = y - era * 400; // [0, 399]
  const dayOfYear = Math.floor((153 * m + 2) / 5) + day - 1;
  const dayOfEra =
    yearOfEra * 365 +
    Math.floor(yearOfEra / 4) -
    Math.floor(yearOfEra / 100) +
    dayOfYear;

  return era * DAYS_PER_ERA + dayOfEra - EPOCH_SHIFT;
}

/**
 * Parse `HH[:MM]` into seconds. Unreadable parts count as zero.
 */
function offsetSeconds(value: string): number {
  const [hours, minutes] = value.split(":");
  return (parseInteger(hours) ?? 0) * 3600 + (parseInteger(minutes) ?? 0) * 60;
}

/**
 * Split the time-of-day from a trailing UTC offset.
 *
 * A `-` only counts as an offset sign past index 6 of the time string, so
 * short or odd inputs are left for the time parser to reject.
 */
function splitOffset(rest: string): { time: string; offset: number } {
  const plus = rest.lastIndexOf("+");
  if (plus !== -1) {
    if (plus === 0) return { time: rest, offset: 0 };
    return {
      time: rest.slice(0, plus),
      offset: offsetSeconds(rest.slice(plus + 1))
    };
  }

  const minus = rest.lastIndexOf("-");
  if (minus > 6) {
    return {
      time: rest.slice(0, minus),
      offset: -offsetSeconds(rest.slice(minus + 1))
    };
  }

  return { time: rest, offset: 0 };
}

/**
 * Convert an ISO-8601 timestamp to epoch seconds, including fractional
 * seconds. Returns null instead of throwing on anything it cannot read.
 */
export function parseIsoTimestamp(value: string): number | null {
  const normalized = value.replace(/Z/g, "+00:00");

  const separator = normalized.indexOf("T");
  if (separator === -1) return null;

  const dateFields = normalized.slice(0, separator).split("-");
  if (dateFields.length !== 3) return null;
  const year = parseInteger(dateFields[0]);
  const month = parseInteger(dateFields[1]);
  const day = parseInteger(dateFields[2]);
  if (year === null || month === null || day === null) return null;

  const { time, offset } = splitOffset(normalized.slice(separator + 1));

  const timeFields = time.split(":");
  if (timeFields.length < 2) return null;
  const hour = parseInteger(timeFields[0]);
  const minute = parseInteger(timeFields[1]);
  if (hour === null || minute === null) return null;

  const [wholeSeconds, fractionDigits] = (timeFields[2] ?? "0").split(".");
  const second = parseInteger(wholeSeconds);
  if (second === null) return null;

  let fraction = 0;
  if (fractionDigits !== undefined) {
    if (!DIGITS.test(fractionDigits)) return null;
    // Read as 0.<digits> so long fractions stay finite
    fraction = Number(`0.${fractionDigits}`);
  }

  const days = daysFromCivil(year, month, day);
  const seconds = days * SECONDS_PER_DAY + hour * 3600 + minute * 60 + second;
  return seconds + fraction - offset;
}
