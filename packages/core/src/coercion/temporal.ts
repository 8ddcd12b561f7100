const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATETIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[Tt ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?([Zz]|[+-]\d{2}:?\d{2})?$/;

function utcDate(year: number, month: number, day: number): Date | null {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

/** Parses `YYYY-MM-DD` into a `Date` at UTC midnight, rejecting impossible dates. */
export function parseIsoDate(text: string): Date | null {
  const match = DATE_PATTERN.exec(text);
  if (!match) return null;
  return utcDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

function parseOffsetMinutes(offset: string | undefined): number | null {
  if (!offset || offset === "Z" || offset === "z") return 0;
  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 60 + minutes);
}

/**
 * Parses an ISO-8601 date-time. A missing offset means UTC; a missing time
 * means midnight. Fractions beyond milliseconds are truncated.
 */
export function parseIsoDateTime(text: string): Date | null {
  const match = DATETIME_PATTERN.exec(text);
  if (!match) return null;

  const date = utcDate(Number(match[1]), Number(match[2]), Number(match[3]));
  if (!date) return null;

  const hours = Number(match[4] ?? 0);
  const minutes = Number(match[5] ?? 0);
  const seconds = Number(match[6] ?? 0);
  const millis = Number((match[7] ?? "").slice(0, 3).padEnd(3, "0"));
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  const offset = parseOffsetMinutes(match[8]);
  if (offset === null) return null;

  date.setUTCHours(hours, minutes, seconds, millis);
  return new Date(date.getTime() - offset * 60_000);
}

export function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

export function isUtcMidnight(date: Date): boolean {
  return (
    date.getUTCHours() === 0 &&
    date.getUTCMinutes() === 0 &&
    date.getUTCSeconds() === 0 &&
    date.getUTCMilliseconds() === 0
  );
}
