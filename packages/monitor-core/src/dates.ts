const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export function isBusinessDate(value: string): boolean {
  if (!DATE_PATTERN.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && formatBusinessDate(parsed) === value;
}

export function formatBusinessDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function addDays(businessDate: string, days: number): string {
  const start = new Date(`${businessDate}T00:00:00Z`).getTime();
  return formatBusinessDate(new Date(start + days * DAY_MS));
}

/**
 * Inclusive list of dates from start to end; empty when end precedes start.
 */
export function dateRange(start: string, end: string): string[] {
  const dates: string[] = [];
  for (let current = start; current <= end; current = addDays(current, 1)) {
    dates.push(current);
  }
  return dates;
}

/**
 * Default target of a scheduled run: games finish late, so the morning run
 * looks at yesterday.
 */
export function yesterday(now: Date): string {
  return addDays(formatBusinessDate(now), -1);
}
