import { mean } from "../stats.ts";
import type { CleaningResult, RawWeatherRecord, WeatherMetric } from "./types.ts";
import { WEATHER_METRICS } from "./types.ts";

function presentValues(records: readonly RawWeatherRecord[], metric: WeatherMetric): number[] {
  const values: number[] = [];
  for (const record of records) {
    const value = record[metric];
    if (value !== null) values.push(value);
  }
  return values;
}

/**
 * Replace every missing measurement with its column mean and sort by date.
 * A column with no values at all is filled with 0.
 */
export function cleanWeather(records: readonly RawWeatherRecord[]): CleaningResult {
  const fillValues: Record<WeatherMetric, number> = { temperature: 0, humidity: 0, rainfall: 0 };
  const filled: Record<WeatherMetric, number> = { temperature: 0, humidity: 0, rainfall: 0 };

  for (const metric of WEATHER_METRICS) {
    const values = presentValues(records, metric);
    fillValues[metric] = values.length > 0 ? mean(values) : 0;
    filled[metric] = records.length - values.length;
  }

  const cleaned = records
    .map((record) => ({
      date: record.date,
      temperature: record.temperature ?? fillValues.temperature,
      humidity: record.humidity ?? fillValues.humidity,
      rainfall: record.rainfall ?? fillValues.rainfall,
    }))
    .sort((a, b) => a.date.getTime() - b.date.getTime());

  return { records: cleaned, filled, fillValues };
}
