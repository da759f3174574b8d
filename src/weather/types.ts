import type { Season } from "../dates.ts";
import type { LoadResult, SummaryStats } from "../types.ts";

// The three measured columns, in the order they appear in every output
export type WeatherMetric = "temperature" | "humidity" | "rainfall";
export const WEATHER_METRICS: readonly WeatherMetric[] = ["temperature", "humidity", "rainfall"];

// One row as read from the CSV. A measurement that was empty or not a number is null.
export interface RawWeatherRecord {
  date: Date;
  temperature: number | null;  // degrees C
  humidity: number | null;     // percent
  rainfall: number | null;     // mm
}

// After cleaning every measurement is present
export interface WeatherRecord {
  date: Date;
  temperature: number;
  humidity: number;
  rainfall: number;
}

export interface CleaningResult {
  records: WeatherRecord[];                   // Ascending by date
  filled: Record<WeatherMetric, number>;      // How many nulls were replaced, per metric
  fillValues: Record<WeatherMetric, number>;  // The value each metric's nulls were replaced with
}

export interface DailyWeather {
  day: string;            // "2024-01-15"
  temperature: number;    // Mean over the day's readings
  humidity: number;
  rainfall: number;
  readings: number;
}

export interface MonthlyWeather {
  month: string;          // "2024-01"
  meanTemperature: number;
  minTemperature: number;
  maxTemperature: number;
  meanHumidity: number;
  totalRainfall: number;
  readings: number;
}

export interface SeasonalWeather {
  season: Season;
  meanTemperature: number;
  meanHumidity: number;
  totalRainfall: number;
  readings: number;
}

export type OverallWeather = Record<WeatherMetric, SummaryStats>;

export interface WeatherAggregates {
  daily: DailyWeather[];
  monthly: MonthlyWeather[];
  seasonal: SeasonalWeather[];     // Winter, Spring, Summer, Autumn; seasons without data are left out
  overall?: OverallWeather;        // Undefined when there are no records
}

// Loading can stop at the file level (missing file, unusable header) or succeed with row errors
export type WeatherLoadResult =
  | { status: "not_found"; path: string }
  | { status: "unreadable"; path: string; error: string }
  | { status: "missing_columns"; path: string; missing: string[] }
  | ({ status: "ok"; path: string } & LoadResult<RawWeatherRecord>);
