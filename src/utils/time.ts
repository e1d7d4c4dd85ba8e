export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Compact UTC timestamp for file names, e.g. `20261018T142501Z`.
 */
export function timestampId(date = new Date()): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return [
    date.getUTCFullYear(),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
    'T',
    pad(date.getUTCHours()),
    pad(date.getUTCMinutes()),
    pad(date.getUTCSeconds()),
    'Z'
  ].join('');
}

/**
 * Next occurrence of `dayOfWeek` (0 = Sunday) at `hour`:00 local time,
 * strictly after `from`.
 */
export function nextWeeklyOccurrence(from: Date, dayOfWeek: number, hour: number): Date {
  const next = new Date(from.getTime());
  next.setHours(hour, 0, 0, 0);
  const daysAhead = (dayOfWeek - next.getDay() + 7) % 7;
  next.setDate(next.getDate() + daysAhead);
  if (next.getTime() <= from.getTime()) {
    next.setDate(next.getDate() + 7);
  }
  return next;
}
