import { dayKey, monthKey, SEASONS, seasonIndex } from "../dates.ts";
import { groupBy, mean, summarize, sum } from "../stats.ts";
import type {
  DailyWeather,
  MonthlyWeather,
  OverallWeather,
  SeasonalWeather,
  WeatherAggregates,
  WeatherRecord,
} from "./types.ts";

const temperatures = (records: readonly WeatherRecord[]) => records.map((record) => record.temperature);
const humidities = (records: readonly WeatherRecord[]) => records.map((record) => record.humidity);
const rainfalls = (records: readonly WeatherRecord[]) => records.map((record) => record.rainfall);

/**
 * Mean of each measurement per calendar day, ascending.
 */
export function dailyWeather(records: readonly WeatherRecord[]): DailyWeather[] {
  return [...groupBy(records, (record) => dayKey(record.date))].map(([day, group]) => ({
    day,
    temperature: mean(temperatures(group)),
    humidity: mean(humidities(group)),
    rainfall: mean(rainfalls(group)),
    readings: group.length,
  }));
}

export function monthlyWeather(records: readonly WeatherRecord[]): MonthlyWeather[] {
  return [...groupBy(records, (record) => monthKey(record.date))].map(([month, group]) => {
    const temps = temperatures(group);
    return {
      month,
      meanTemperature: mean(temps),
      minTemperature: temps.reduce((acc, value) => Math.min(acc, value)),
      maxTemperature: temps.reduce((acc, value) => Math.max(acc, value)),
      meanHumidity: mean(humidities(group)),
      totalRainfall: sum(rainfalls(group)),
      readings: group.length,
    };
  });
}

/**
 * Meteorological seasons pooled across years (every December-February is Winter),
 * in Winter, Spring, Summer, Autumn order.
 */
export function seasonalWeather(records: readonly WeatherRecord[]): SeasonalWeather[] {
  return [...groupBy(records, (record) => seasonIndex(record.date))].map(([index, group]) => ({
    season: SEASONS[index],
    meanTemperature: mean(temperatures(group)),
    meanHumidity: mean(humidities(group)),
    totalRainfall: sum(rainfalls(group)),
    readings: group.length,
  }));
}

export function overallWeather(records: readonly WeatherRecord[]): OverallWeather | undefined {
  const temperature = summarize(temperatures(records));
  const humidity = summarize(humidities(records));
  const rainfall = summarize(rainfalls(records));
  if (!temperature || !humidity || !rainfall) return undefined;
  return { temperature, humidity, rainfall };
}

export function aggregateWeather(records: readonly WeatherRecord[]): WeatherAggregates {
  return {
    daily: dailyWeather(records),
    monthly: monthlyWeather(records),
    seasonal: seasonalWeather(records),
    overall: overallWeather(records),
  };
}
