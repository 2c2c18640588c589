import fs from 'fs';
import { z } from 'zod';

/**
 * Docker secrets arrive as a `/run/secrets/...` path; anything else is
 * the literal value.
 */
export function resolveSecret(value: string): string {
  if (value.startsWith('/run/secrets/')) {
    return fs.readFileSync(value, 'utf8').trim();
  }
  return value;
}

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),

  OPENWEATHER_API_KEY: z.string().min(1),
  OPENWEATHER_BASE_URL: z.string().url().default('https://api.openweathermap.org/data/2.5'),
  OPENWEATHER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  CACHE_TTL_CURRENT_SECONDS: z.coerce.number().int().positive().default(300),
  CACHE_TTL_FORECAST_SECONDS: z.coerce.number().int().positive().default(3600),

  BREAKER_FAILURE_THRESHOLD: z.coerce.number().int().positive().default(3),
  BREAKER_COOLDOWN_MS: z.coerce.number().int().positive().default(60_000),

  STORE_BACKEND: z.enum(['valkey', 'memory']).default('valkey'),
  VALKEY_HOST: z.string().min(1).default('127.0.0.1'),
  VALKEY_PORT: z.coerce.number().int().positive().default(6379),
  VALKEY_PASSWORD: z.string().optional(),
  VALKEY_PASSWORD_FILE: z.string().optional(),
  VALKEY_COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),

  KAFKA_BROKER_ADDRESS: z.string().min(1),
});

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  openWeather: {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
  };
  ttl: {
    currentMs: number;
    forecastMs: number;
  };
  breaker: {
    failureThreshold: number;
    cooldownMs: number;
  };
  store:
    | { backend: 'memory' }
    | {
        backend: 'valkey';
        host: string;
        port: number;
        password?: string;
        commandTimeoutMs: number;
      };
  kafka: {
    brokers: string[];
  };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = envSchema.parse(source);

  const password =
    env.VALKEY_PASSWORD ??
    (env.VALKEY_PASSWORD_FILE
      ? fs.readFileSync(env.VALKEY_PASSWORD_FILE, 'utf8').trim()
      : undefined);

  return {
    env: env.NODE_ENV,
    openWeather: {
      apiKey: resolveSecret(env.OPENWEATHER_API_KEY),
      baseUrl: env.OPENWEATHER_BASE_URL.replace(/\/+$/, ''),
      timeoutMs: env.OPENWEATHER_TIMEOUT_MS,
    },
    ttl: {
      currentMs: env.CACHE_TTL_CURRENT_SECONDS * 1000,
      forecastMs: env.CACHE_TTL_FORECAST_SECONDS * 1000,
    },
    breaker: {
      failureThreshold: env.BREAKER_FAILURE_THRESHOLD,
      cooldownMs: env.BREAKER_COOLDOWN_MS,
    },
    store:
      env.STORE_BACKEND === 'memory'
        ? { backend: 'memory' }
        : {
            backend: 'valkey',
            host: env.VALKEY_HOST,
            port: env.VALKEY_PORT,
            password,
            commandTimeoutMs: env.VALKEY_COMMAND_TIMEOUT_MS,
          },
    kafka: {
      brokers: env.KAFKA_BROKER_ADDRESS.split(',').map((b) => b.trim()),
    },
  };
}
