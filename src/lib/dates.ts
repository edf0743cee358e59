export const DAY_MS = 24 * 60 * 60 * 1000;

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/** UTC calendar day as YYYY-MM-DD. */
export function toDateKey(date: Date): string {
  return date.toISOString().split("T")[0];
}

export function isValidDate(value: Date): boolean {
  return !Number.isNaN(value.getTime());
}
