export type WeatherErrorKind =
  | 'InvalidInput'
  | 'UpstreamUnavailable'
  | 'NotFound'
  | 'StoreUnavailable';

export type UpstreamReason =
  | 'timeout'
  | 'api_error'
  | 'rate_limited'
  | 'malformed_response'
  | 'unsupported_date'
  | 'circuit_open'
  | 'cancelled';

export type UpstreamDetail = {
  reason: UpstreamReason;
  status?: number;
  code?: string;
};

export abstract class WeatherError extends Error {
  abstract readonly kind: WeatherErrorKind;
  abstract readonly detail: Record<string, unknown>;
}

export class InvalidInputError extends WeatherError {
  readonly kind = 'InvalidInput';
  readonly detail: { field: string };

  constructor(field: string, message: string) {
    super(message);
    this.name = 'InvalidInputError';
    this.detail = { field };
  }
}

export class UpstreamUnavailableError extends WeatherError {
  readonly kind = 'UpstreamUnavailable';
  readonly detail: UpstreamDetail;

  constructor(detail: UpstreamDetail, message = 'Weather provider unavailable') {
    super(message);
    this.name = 'UpstreamUnavailableError';
    this.detail = detail;
  }
}

export class NotFoundError extends WeatherError {
  readonly kind = 'NotFound';
  readonly detail: { city: string };

  constructor(city: string) {
    super(`Unknown location: ${city}`);
    this.name = 'NotFoundError';
    this.detail = { city };
  }
}

/**
 * Raised when the cache or override backing store cannot be reached.
 * Never downgraded to a miss.
 */
export class StoreUnavailableError extends WeatherError {
  readonly kind = 'StoreUnavailable';
  readonly detail: { operation: string };

  constructor(operation: string, message = 'Backing store unavailable') {
    super(message);
    this.name = 'StoreUnavailableError';
    this.detail = { operation };
  }
}

export function isWeatherError(err: unknown): err is WeatherError {
  return err instanceof WeatherError;
}

// Anything that escapes the typed paths is reported as an upstream fault
export function toWeatherError(err: unknown): WeatherError {
  if (isWeatherError(err)) return err;

  const message = err instanceof Error ? err.message : String(err);
  return new UpstreamUnavailableError({ reason: 'api_error' }, message);
}
