const DAY_IN_MS = 24 * 60 * 60 * 1000;

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

/**
 * Local calendar date as YYYY-MM-DD
 */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * 1-based ordinal day of the local calendar date (Jan 1 = 1).
 * Computed on UTC midnights so daylight saving shifts cannot skew it.
 */
export function dayOfYear(date: Date): number {
  const start = Date.UTC(date.getFullYear(), 0, 1);
  const current = Date.UTC(date.getFullYear(), date.getMonth(), date.getDate());
  return Math.round((current - start) / DAY_IN_MS) + 1;
}
