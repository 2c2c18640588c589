import { TtlCache } from '../cache';
import { UpstreamUnavailableError } from '../errors';
import {
  CurrentWeather,
  ForecastRange,
  ResolveOptions,
  WeatherProvider,
} from '../interfaces/weather';
import { logger } from '../logger';
import { OverrideStore } from '../store/overrideStore';
import { normalizeCity, parseDateKey, toIsoDate, validateRange } from '../utils/input';

export interface WeatherServiceDeps {
  provider: WeatherProvider;
  currentCache: TtlCache<CurrentWeather>;
  forecastCache: TtlCache<ForecastRange>;
  overrides: OverrideStore;
  ttl: {
    currentMs: number;
    forecastMs: number;
  };
}

export const currentCacheKey = (city: string) => `current:${city}`;

export const forecastCacheKey = (city: string, isoDate: string) =>
  `forecast:${city}:${isoDate}`;

/**
 * Resolves weather queries: override, then cache, then provider.
 */
export class WeatherService {
  constructor(private readonly deps: WeatherServiceDeps) {}

  async getCurrentWeather(
    cityInput: string,
    options: ResolveOptions = {}
  ): Promise<CurrentWeather> {
    const city = normalizeCity(cityInput);
    const cacheKey = currentCacheKey(city);

    const cached = await this.deps.currentCache.get(cacheKey);
    if (cached) {
      logger.info({ city, source: 'cache' }, 'Current weather resolved');
      return cached;
    }

    const weather = await this.deps.provider.fetchCurrent(city, options);
    assertNotAborted(options);

    await this.deps.currentCache.set(cacheKey, weather, this.deps.ttl.currentMs);
    logger.info({ city, source: 'api' }, 'Current weather resolved');

    return weather;
  }

  async getForecast(
    cityInput: string,
    dateInput: string,
    options: ResolveOptions = {}
  ): Promise<ForecastRange> {
    const city = normalizeCity(cityInput);
    const date = parseDateKey(dateInput);
    const isoDate = toIsoDate(date);

    // Overrides always win over cache and provider
    const override = await this.deps.overrides.get(city, date);
    if (override) {
      logger.info({ city, date: isoDate, source: 'override' }, 'Forecast resolved');
      return override;
    }

    const cacheKey = forecastCacheKey(city, isoDate);
    const cached = await this.deps.forecastCache.get(cacheKey);
    if (cached) {
      logger.info({ city, date: isoDate, source: 'cache' }, 'Forecast resolved');
      return cached;
    }

    const range = await this.deps.provider.fetchForecast(city, date, options);
    assertNotAborted(options);

    await this.deps.forecastCache.set(cacheKey, range, this.deps.ttl.forecastMs);
    logger.info({ city, date: isoDate, source: 'api' }, 'Forecast resolved');

    return range;
  }

  /**
   * Stores an override and drops the cached forecast for the same key.
   * If the cache delete fails after the write, the override is already
   * stored and shadows the cache; repeating the call is safe since the
   * write is idempotent.
   */
  async setOverride(
    cityInput: string,
    dateInput: string,
    range: ForecastRange
  ): Promise<ForecastRange> {
    const city = normalizeCity(cityInput);
    const date = parseDateKey(dateInput);
    const { minTemperature, maxTemperature } = validateRange(range);
    const stored: ForecastRange = { minTemperature, maxTemperature };

    await this.deps.overrides.put(city, date, stored);
    await this.deps.forecastCache.delete(forecastCacheKey(city, toIsoDate(date)));

    logger.info({ city, date: toIsoDate(date), ...stored }, 'Forecast override stored');
    return stored;
  }
}

// A result that arrives after the caller gave up is not cached
function assertNotAborted({ signal }: ResolveOptions): void {
  if (signal?.aborted) {
    throw new UpstreamUnavailableError({ reason: 'cancelled' }, 'Weather request cancelled');
  }
}
