import { z } from "zod";
import {
  CurrentWeatherSchema,
  ForecastRangeSchema,
} from "../schemas/weather.schema";

/* ------------------ Domain Types ------------------ */

export type CurrentWeather = z.infer<typeof CurrentWeatherSchema>;
export type ForecastRange = z.infer<typeof ForecastRangeSchema>;

/** Calendar date parsed from `dd.MM.yyyy`. */
export interface DateKey {
  year: number;
  month: number;
  day: number;
}

export interface ResolveOptions {
  signal?: AbortSignal;
}

/* ------------------ Provider Port ------------------ */

export interface WeatherProvider {
  fetchCurrent(city: string, options?: ResolveOptions): Promise<CurrentWeather>;
  fetchForecast(
    city: string,
    date: DateKey,
    options?: ResolveOptions
  ): Promise<ForecastRange>;
}
