import { z } from "zod";

/* ------------------ /weather ------------------ */

export const CurrentResponseSchema = z.object({
  name: z.string().optional(),
  dt: z.number(),
  timezone: z.number(), // seconds from UTC
  main: z.object({
    temp: z.number(),
  }),
});

/* ------------------ /forecast ------------------ */

export const ForecastSampleSchema = z.object({
  dt: z.number(), // unix seconds, UTC
  main: z.object({
    temp: z.number(),
  }),
});

export const ForecastResponseSchema = z.object({
  list: z.array(ForecastSampleSchema),
  city: z.object({
    name: z.string().optional(),
    timezone: z.number(),
  }),
});

export type CurrentResponse = z.infer<typeof CurrentResponseSchema>;
export type ForecastSample = z.infer<typeof ForecastSampleSchema>;
export type ForecastResponse = z.infer<typeof ForecastResponseSchema>;
