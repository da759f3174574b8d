import { toCsv } from "../csv.ts";
import { dayKey, formatDateTime } from "../dates.ts";
import { round } from "../stats.ts";
import { formatNumber, renderTable } from "../table.ts";
import type { CleaningResult, WeatherAggregates, WeatherMetric, WeatherRecord } from "./types.ts";
import { WEATHER_METRICS } from "./types.ts";

// Plain dates stay plain; readings with a time of day keep it
export function formatWeatherDate(date: Date): string {
  const midnight = date.getUTCHours() === 0 && date.getUTCMinutes() === 0 && date.getUTCSeconds() === 0;
  return midnight ? dayKey(date) : formatDateTime(date);
}

/**
 * weather_cleaned.csv. Filled-in means are rounded to two decimals.
 */
export function cleanedWeatherCsv(records: readonly WeatherRecord[]): string {
  return toCsv([
    ["date", "temperature", "humidity", "rainfall"],
    ...records.map((record) => [
      formatWeatherDate(record.date),
      String(round(record.temperature)),
      String(round(record.humidity)),
      String(round(record.rainfall)),
    ]),
  ]);
}

const LABELS: Record<WeatherMetric, string> = { temperature: "Temperature", humidity: "Humidity", rainfall: "Rainfall" };

export function renderWeatherSummary(aggregates: WeatherAggregates, cleaning: CleaningResult): string {
  const { records, filled } = cleaning;
  const { overall } = aggregates;
  const sections: string[] = ["Weather Summary", "==============="];

  if (!overall || records.length === 0) {
    sections.push("No records to analyze.");
    return `${sections.join("\n")}\n`;
  }

  sections.push(`Records: ${records.length}`);
  sections.push(`Period: ${formatWeatherDate(records[0].date)} to ${formatWeatherDate(records[records.length - 1].date)}`);
  sections.push(
    `Missing values filled with column means: ` +
      WEATHER_METRICS.map((metric) => `${metric} ${filled[metric]}`).join(", "),
  );

  sections.push("");
  sections.push("Overall statistics:");
  sections.push(renderTable(
    [
      { header: "Metric" },
      { header: "Mean", align: "right" },
      { header: "Median", align: "right" },
      { header: "Min", align: "right" },
      { header: "Max", align: "right" },
      { header: "Std Dev", align: "right" },
    ],
    WEATHER_METRICS.map((metric) => {
      const stats = overall[metric];
      return [
        LABELS[metric],
        formatNumber(stats.mean),
        formatNumber(stats.median),
        formatNumber(stats.min),
        formatNumber(stats.max),
        formatNumber(stats.stdDev),
      ];
    }),
  ));

  sections.push("");
  sections.push("Monthly aggregates:");
  sections.push(renderTable(
    [
      { header: "Month" },
      { header: "Mean Temp", align: "right" },
      { header: "Min Temp", align: "right" },
      { header: "Max Temp", align: "right" },
      { header: "Mean Humidity", align: "right" },
      { header: "Total Rainfall", align: "right" },
    ],
    aggregates.monthly.map((month) => [
      month.month,
      formatNumber(month.meanTemperature),
      formatNumber(month.minTemperature),
      formatNumber(month.maxTemperature),
      formatNumber(month.meanHumidity),
      formatNumber(month.totalRainfall),
    ]),
  ));

  sections.push("");
  sections.push("Seasonal aggregates:");
  sections.push(renderTable(
    [
      { header: "Season" },
      { header: "Mean Temp", align: "right" },
      { header: "Mean Humidity", align: "right" },
      { header: "Total Rainfall", align: "right" },
      { header: "Readings", align: "right" },
    ],
    aggregates.seasonal.map((season) => [
      season.season,
      formatNumber(season.meanTemperature),
      formatNumber(season.meanHumidity),
      formatNumber(season.totalRainfall),
      String(season.readings),
    ]),
  ));

  return `${sections.join("\n")}\n`;
}
