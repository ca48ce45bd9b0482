// Date helpers shared by the adapters (all in UTC)

const pad = (value: number) => String(value).padStart(2, '0');

/** 2025-10-15 */
export function isoDay(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/** 10/15/2025, the format Grants.gov expects */
export function usDay(date: Date): string {
  return `${pad(date.getUTCMonth() + 1)}/${pad(date.getUTCDate())}/${date.getUTCFullYear()}`;
}

/**
 * Federal fiscal year for a date: October onward belongs to the next year.
 */
export function fiscalYear(date: Date): number {
  return date.getUTCMonth() >= 9 ? date.getUTCFullYear() + 1 : date.getUTCFullYear();
}

export function fiscalYearBounds(fy: number): { start: string; end: string } {
  return { start: `${fy - 1}-10-01`, end: `${fy}-09-30` };
}

export function daysBetween(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / 86_400_000);
}

export function windowStart(now: Date, days: number): Date {
  return new Date(now.getTime() - days * 86_400_000);
}
