import { InvalidInputError } from '../errors';
import { DateKey, ForecastRange } from '../interfaces/weather';

const CITY_MAX_LENGTH = 100;
const MIN_TEMPERATURE = -100;
const MAX_TEMPERATURE = 100;

const DATE_PATTERN = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;

/**
 * Canonical lookup key for a free-text city name.
 */
export function normalizeCity(city: string): string {
  const key = city.trim().replace(/\s+/g, ' ').toLowerCase();

  if (!key) {
    throw new InvalidInputError('city', 'City must not be empty');
  }
  if (key.length > CITY_MAX_LENGTH) {
    throw new InvalidInputError(
      'city',
      `City must be at most ${CITY_MAX_LENGTH} characters`
    );
  }
  return key;
}

export function parseDateKey(text: string): DateKey {
  const match = DATE_PATTERN.exec(text.trim());
  if (!match) {
    throw new InvalidInputError('date', 'Date must be in dd.MM.yyyy format');
  }

  const day = Number(match[1]);
  const month = Number(match[2]);
  const year = Number(match[3]);

  // setUTCFullYear keeps years 0-99 literal; the round trip catches 31.02
  const calendar = new Date(0);
  calendar.setUTCFullYear(year, month - 1, day);
  if (
    year < 1 ||
    calendar.getUTCFullYear() !== year ||
    calendar.getUTCMonth() !== month - 1 ||
    calendar.getUTCDate() !== day
  ) {
    throw new InvalidInputError('date', `Not a calendar date: ${text}`);
  }

  return { year, month, day };
}

export function toIsoDate({ year, month, day }: DateKey): string {
  const mm = String(month).padStart(2, '0');
  const dd = String(day).padStart(2, '0');
  return `${String(year).padStart(4, '0')}-${mm}-${dd}`;
}

export function validateRange(range: ForecastRange): ForecastRange {
  const { minTemperature, maxTemperature } = range;

  for (const [field, value] of [
    ['minTemperature', minTemperature],
    ['maxTemperature', maxTemperature],
  ] as const) {
    if (!Number.isFinite(value)) {
      throw new InvalidInputError(field, `${field} must be a finite number`);
    }
    if (value < MIN_TEMPERATURE || value > MAX_TEMPERATURE) {
      throw new InvalidInputError(
        field,
        `${field} must be between ${MIN_TEMPERATURE} and ${MAX_TEMPERATURE}`
      );
    }
  }

  if (minTemperature > maxTemperature) {
    throw new InvalidInputError(
      'range',
      'minTemperature must not exceed maxTemperature'
    );
  }
  return range;
}
