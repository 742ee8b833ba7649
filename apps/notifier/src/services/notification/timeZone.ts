export type ZonedParts = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
};

const formatters = new Map<string, Intl.DateTimeFormat>();

const getFormatter = (timeZone: string): Intl.DateTimeFormat => {
  const cached = formatters.get(timeZone);
  if (cached) {
    return cached;
  }
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  });
  formatters.set(timeZone, formatter);
  return formatter;
};

export const isValidTimeZone = (timeZone: string): boolean => {
  if (!timeZone) {
    return false;
  }
  try {
    getFormatter(timeZone);
    return true;
  } catch {
    return false;
  }
};

/** Unknown zones resolve to UTC. */
export const resolveTimeZone = (timeZone: string): string =>
  isValidTimeZone(timeZone) ? timeZone : 'UTC';

export const getZonedParts = (date: Date, timeZone: string): ZonedParts => {
  const values: Partial<Record<Intl.DateTimeFormatPartTypes, number>> = {};
  for (const part of getFormatter(timeZone).formatToParts(date)) {
    if (part.type !== 'literal') {
      values[part.type] = Number(part.value);
    }
  }
  return {
    year: values.year ?? date.getUTCFullYear(),
    month: values.month ?? date.getUTCMonth() + 1,
    day: values.day ?? date.getUTCDate(),
    hour: values.hour ?? 0,
    minute: values.minute ?? 0,
    second: values.second ?? 0,
  };
};

const offsetMsAt = (timeZone: string, utcMs: number): number => {
  const wholeSecondMs = Math.floor(utcMs / 1000) * 1000;
  const local = getZonedParts(new Date(wholeSecondMs), timeZone);
  const localAsUtc = Date.UTC(
    local.year,
    local.month - 1,
    local.day,
    local.hour,
    local.minute,
    local.second,
  );
  return localAsUtc - wholeSecondMs;
};

/**
 * Converts a wall-clock time in `timeZone` to the instant it denotes. Two
 * passes settle the offset on either side of a DST change.
 */
export const zonedTimeToUtc = (
  wallTime: Pick<ZonedParts, 'year' | 'month' | 'day' | 'hour' | 'minute'>,
  timeZone: string,
): Date => {
  const localAsUtc = Date.UTC(
    wallTime.year,
    wallTime.month - 1,
    wallTime.day,
    wallTime.hour,
    wallTime.minute,
  );
  let guess = localAsUtc;
  for (let pass = 0; pass < 2; pass += 1) {
    guess = localAsUtc - offsetMsAt(timeZone, guess);
  }
  return new Date(guess);
};
