import { aggregateDailyRange, roundTemperature } from '@/utils/forecast';
import { formatLocalTime, localIsoDate } from '@/utils/time';

const unix = (iso: string) => Date.parse(iso) / 1000;

describe('time helpers (unit)', () => {
  it('formats local wall-clock time from a UTC offset', () => {
    const utc = Date.parse('2025-01-15T23:30:00Z');

    expect(formatLocalTime(utc, 0)).toBe('23:30');
    expect(formatLocalTime(utc, 19_800)).toBe('05:00'); // +05:30
    expect(formatLocalTime(utc, -18_000)).toBe('18:30'); // -05:00
  });

  it('derives the local calendar date of a timestamp', () => {
    expect(localIsoDate(unix('2025-01-15T23:30:00Z'), 3600)).toBe('2025-01-16');
    expect(localIsoDate(unix('2025-01-15T00:30:00Z'), -3600)).toBe('2025-01-14');
  });
});

describe('aggregateDailyRange (unit)', () => {
  /**
   * Purpose:
   * Verifies Core behavior:
   * - samples are grouped by local date
   * - min and max are taken across that day only
   */
  it('returns min and max for the local day', () => {
    const samples = [
      { dt: unix('2025-06-01T21:00:00Z'), main: { temp: 11 } }, // 00:00 next day at +3
      { dt: unix('2025-06-01T03:00:00Z'), main: { temp: 12.34 } },
      { dt: unix('2025-06-01T12:00:00Z'), main: { temp: 24.96 } },
      { dt: unix('2025-06-01T18:00:00Z'), main: { temp: 18 } },
    ];

    expect(aggregateDailyRange(samples, '2025-06-01', 10_800)).toEqual({
      minTemperature: 12.3,
      maxTemperature: 25,
    });
  });

  it('returns null when no sample falls on the date', () => {
    expect(aggregateDailyRange([], '2025-06-01', 0)).toBeNull();
    expect(
      aggregateDailyRange([{ dt: unix('2025-06-02T12:00:00Z'), main: { temp: 1 } }], '2025-06-01', 0)
    ).toBeNull();
  });

  it('rounds to one decimal', () => {
    expect(roundTemperature(-3.14)).toBe(-3.1);
    expect(roundTemperature(6.27)).toBe(6.3);
  });
});
