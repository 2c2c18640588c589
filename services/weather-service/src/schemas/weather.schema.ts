import { z } from "zod";

/**
 * Values the service keeps in the cache and override store.
 */
export const CurrentWeatherSchema = z.object({
  temperature: z.number(),
  localTime: z.string().regex(/^\d{2}:\d{2}$/),
});

export const ForecastRangeSchema = z.object({
  minTemperature: z.number(),
  maxTemperature: z.number(),
});

// The value is checked separately against the schema of its kind
export const CacheEntrySchema = z.object({
  value: z.unknown(),
  expiresAt: z.number(),
});
