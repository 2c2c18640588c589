import axios, { AxiosInstance, AxiosResponse } from 'axios';
import https from 'https';
import { z } from 'zod';

import { NotFoundError, UpstreamUnavailableError } from '../errors';
import {
  CurrentWeather,
  DateKey,
  ForecastRange,
  ResolveOptions,
  WeatherProvider,
} from '../interfaces/weather';
import { logger } from '../logger';
import {
  CurrentResponseSchema,
  ForecastResponseSchema,
} from '../schemas/openWeather.schema';
import { aggregateDailyRange, roundTemperature } from '../utils/forecast';
import { toIsoDate } from '../utils/input';
import { Clock, formatLocalTime, systemClock } from '../utils/time';
import { CircuitBreaker } from './circuitBreaker';

export interface OpenWeatherConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export type HttpGetter = Pick<AxiosInstance, 'get'>;

export interface OpenWeatherDeps {
  http?: HttpGetter;
  breaker?: CircuitBreaker;
  clock?: Clock;
}

/**
 * OpenWeatherMap adapter. Translates provider payloads and failures into
 * domain values and typed errors; never retries.
 */
export class OpenWeatherClient implements WeatherProvider {
  private readonly http: HttpGetter;
  private readonly httpsAgent?: https.Agent;
  private readonly breaker: CircuitBreaker;
  private readonly clock: Clock;

  constructor(
    private readonly config: OpenWeatherConfig,
    deps: OpenWeatherDeps = {}
  ) {
    if (deps.http) {
      this.http = deps.http;
    } else {
      this.httpsAgent = new https.Agent({ keepAlive: true, maxSockets: 10 });
      this.http = axios.create({
        timeout: config.timeoutMs,
        httpsAgent: this.httpsAgent,
      });
    }
    this.breaker = deps.breaker ?? new CircuitBreaker();
    this.clock = deps.clock ?? systemClock;
  }

  async fetchCurrent(city: string, options: ResolveOptions = {}): Promise<CurrentWeather> {
    const body = await this.request('/weather', city, CurrentResponseSchema, options);

    return {
      temperature: roundTemperature(body.main.temp),
      localTime: formatLocalTime(this.clock(), body.timezone),
    };
  }

  async fetchForecast(
    city: string,
    date: DateKey,
    options: ResolveOptions = {}
  ): Promise<ForecastRange> {
    const body = await this.request('/forecast', city, ForecastResponseSchema, options);
    const isoDate = toIsoDate(date);

    const range = aggregateDailyRange(body.list, isoDate, body.city.timezone);
    if (!range) {
      throw new UpstreamUnavailableError(
        { reason: 'unsupported_date' },
        `No forecast available for ${isoDate}`
      );
    }
    return range;
  }

  close(): void {
    this.httpsAgent?.destroy();
  }

  private async request<T>(
    path: string,
    city: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    { signal }: ResolveOptions
  ): Promise<T> {
    if (!this.breaker.canCall()) {
      logger.warn(
        { openUntil: new Date(this.breaker.state().openUntil).toISOString() },
        'Circuit breaker open, skipping OpenWeatherMap call'
      );
      throw new UpstreamUnavailableError(
        { reason: 'circuit_open' },
        'Weather provider temporarily disabled'
      );
    }

    // axios `timeout` only bounds socket idle time; the deadline bounds the
    // whole request, body included
    const deadline = new AbortController();
    let deadlineHit = false;
    const timer = setTimeout(() => {
      deadlineHit = true;
      deadline.abort();
    }, this.config.timeoutMs);

    const onCallerAbort = () => deadline.abort();
    if (signal?.aborted) deadline.abort();
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(`${this.config.baseUrl}${path}`, {
        params: { q: city, units: 'metric', appid: this.config.apiKey },
        timeout: this.config.timeoutMs,
        signal: deadline.signal,
        validateStatus: () => true,
      });
    } catch (err) {
      throw this.transportFailure(err, deadlineHit);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
    }

    const { status } = response;

    if (status === 404) {
      throw new NotFoundError(city);
    }

    if (status < 200 || status >= 300) {
      if (status >= 500) this.breaker.recordFailure();

      logger.error({ city, status }, 'OpenWeatherMap request rejected');
      throw new UpstreamUnavailableError(
        { reason: status === 429 ? 'rate_limited' : 'api_error', status },
        `Weather provider responded with ${status}`
      );
    }

    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      logger.warn({ city, issues: parsed.error.issues }, 'OpenWeatherMap schema mismatch');
      throw new UpstreamUnavailableError(
        { reason: 'malformed_response', status },
        'Weather provider returned an unexpected payload'
      );
    }

    this.breaker.recordSuccess();
    return parsed.data;
  }

  private transportFailure(err: unknown, deadlineHit: boolean): UpstreamUnavailableError {
    if (axios.isCancel(err) && !deadlineHit) {
      return new UpstreamUnavailableError({ reason: 'cancelled' }, 'Weather request cancelled');
    }

    const code = axios.isAxiosError(err) ? err.code : undefined;
    const message = err instanceof Error ? err.message : String(err);

    this.breaker.recordFailure();
    logger.error({ message, code }, 'OpenWeatherMap request failed');

    if (deadlineHit || code === 'ECONNABORTED' || code === 'ETIMEDOUT') {
      return new UpstreamUnavailableError(
        { reason: 'timeout', code: deadlineHit ? 'DEADLINE_EXCEEDED' : code },
        `Weather provider did not answer within ${this.config.timeoutMs}ms`
      );
    }
    return new UpstreamUnavailableError({ reason: 'api_error', code }, message);
  }
}
