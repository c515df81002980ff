/**
 * Round to a fixed number of decimal places
 * Negative zero is normalized to 0.
 */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  const rounded = Math.round(value * factor) / factor;
  return rounded === 0 ? 0 : rounded;
}

/**
 * Formatter for the calendar date (YYYY-MM-DD) of a timestamp as seen in
 * an IANA time zone. Throws a RangeError for an unknown zone.
 */
export function createDateFormatter(timeZone: string): (date: Date) => string {
  const format = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });

  return (date) => {
    const parts = new Map(format.formatToParts(date).map((part) => [part.type, part.value]));
    return `${parts.get('year') ?? ''}-${parts.get('month') ?? ''}-${parts.get('day') ?? ''}`;
  };
}

/**
 * Calendar date (YYYY-MM-DD) of a timestamp, UTC unless a zone is given
 */
export function toIsoDate(date: Date, timeZone = 'UTC'): string {
  return createDateFormatter(timeZone)(date);
}
