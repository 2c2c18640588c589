import { TtlCache } from './cache';
import { AppConfig } from './config';
import { CurrentWeather, ForecastRange } from './interfaces/weather';
import { CircuitBreaker } from './modules/circuitBreaker';
import { OpenWeatherClient } from './modules/openWeatherClient';
import { WeatherService } from './modules/weather';
import { CurrentWeatherSchema, ForecastRangeSchema } from './schemas/weather.schema';
import { KeyValueStore } from './store/keyValueStore';
import { MemoryStore } from './store/memoryStore';
import { OverrideStore } from './store/overrideStore';
import { ValkeyStore } from './store/valkeyStore';
import { Clock, systemClock } from './utils/time';

export interface WeatherStack {
  service: WeatherService;
  store: KeyValueStore;
  provider: OpenWeatherClient;
  close(): Promise<void>;
}

/**
 * Wires the service graph from configuration. The caller owns the
 * returned stack and must close it on shutdown.
 */
export function createWeatherStack(
  config: Pick<AppConfig, 'openWeather' | 'ttl' | 'breaker' | 'store'>,
  clock: Clock = systemClock
): WeatherStack {
  const store: KeyValueStore =
    config.store.backend === 'memory'
      ? new MemoryStore(clock)
      : new ValkeyStore(config.store);

  const provider = new OpenWeatherClient(config.openWeather, {
    breaker: new CircuitBreaker(config.breaker, clock),
    clock,
  });

  const service = new WeatherService({
    provider,
    currentCache: new TtlCache<CurrentWeather>(store, CurrentWeatherSchema, clock),
    forecastCache: new TtlCache<ForecastRange>(store, ForecastRangeSchema, clock),
    overrides: new OverrideStore(store),
    ttl: config.ttl,
  });

  return {
    service,
    store,
    provider,
    async close() {
      provider.close();
      await store.close();
    },
  };
}
