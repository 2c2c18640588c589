import { z } from 'zod';

const envelope = <T extends z.ZodTypeAny>(data: T) =>
  z.object({
    requestId: z.string().min(1).optional(),
    data,
  });

export const CurrentCommandSchema = envelope(
  z.object({
    city: z.string(),
  })
);

export const ForecastCommandSchema = envelope(
  z.object({
    city: z.string(),
    date: z.string(),
  })
);

export const OverrideCommandSchema = envelope(
  z.object({
    city: z.string(),
    date: z.string(),
    minTemperature: z.number(),
    maxTemperature: z.number(),
  })
);

export type CurrentCommand = z.infer<typeof CurrentCommandSchema>;
export type ForecastCommand = z.infer<typeof ForecastCommandSchema>;
export type OverrideCommand = z.infer<typeof OverrideCommandSchema>;
