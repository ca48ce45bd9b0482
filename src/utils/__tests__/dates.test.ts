import { daysBetween, fiscalYear, fiscalYearBounds, isoDay, usDay, windowStart } from '../dates';

describe('date helpers', () => {
  const date = new Date('2025-03-07T23:30:00Z');

  it('formats days in UTC', () => {
    expect(isoDay(date)).toBe('2025-03-07');
    expect(usDay(date)).toBe('03/07/2025');
  });

  it('starts the fiscal year in October', () => {
    expect(fiscalYear(new Date('2025-09-30T23:59:59Z'))).toBe(2025);
    expect(fiscalYear(new Date('2025-10-01T00:00:00Z'))).toBe(2026);
    expect(fiscalYearBounds(2026)).toEqual({ start: '2025-10-01', end: '2026-09-30' });
  });

  it('counts whole days', () => {
    expect(daysBetween(new Date('2025-05-01T00:00:00Z'), new Date('2025-05-31T12:00:00Z'))).toBe(30);
    expect(isoDay(windowStart(date, 14))).toBe('2025-02-21');
  });
});
