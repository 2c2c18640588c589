import { ForecastRange } from '../interfaces/weather';
import { ForecastSample } from '../schemas/openWeather.schema';
import { localIsoDate } from './time';

export function roundTemperature(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Min/max temperature over the samples that fall on `isoDate` in the
 * city's local time. Returns null when the series does not cover that day.
 */
export function aggregateDailyRange(
  samples: ForecastSample[],
  isoDate: string,
  offsetSeconds: number
): ForecastRange | null {
  const temps = samples
    .filter((s) => localIsoDate(s.dt, offsetSeconds) === isoDate)
    .map((s) => s.main.temp);

  if (!temps.length) return null;

  return {
    minTemperature: roundTemperature(Math.min(...temps)),
    maxTemperature: roundTemperature(Math.max(...temps)),
  };
}
