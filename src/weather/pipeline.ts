import { join } from "node:path";

import { savePng, type Chart } from "../chart.ts";
import { writeTextFile } from "../files.ts";
import { errorMessage, type Logger } from "../logger.ts";
import type { WeatherConfig } from "../types.ts";
import { aggregateWeather } from "./aggregate.ts";
import { buildWeatherCharts } from "./charts.ts";
import { cleanWeather } from "./clean.ts";
import { loadWeatherCsv } from "./loader.ts";
import { cleanedWeatherCsv, renderWeatherSummary } from "./report.ts";
import type { WeatherAggregates } from "./types.ts";

export const CLEANED_FILE = "weather_cleaned.csv";
export const SUMMARY_FILE = "weather_summary.txt";

export interface WeatherRunResult {
  aggregates?: WeatherAggregates;  // Undefined when nothing was loaded
  written: string[];
}

/**
 * Load -> clean -> aggregate -> write. Outputs are rewritten on every run.
 */
export async function runWeatherPipeline(config: WeatherConfig, logger: Logger): Promise<WeatherRunResult> {
  logger.info("Starting weather pipeline", { csvPath: config.csvPath, outputDir: config.outputDir });

  // STEP 1: Load
  const loaded = await loadWeatherCsv(config.csvPath);
  if (loaded.status === "not_found") {
    logger.error(`File not found: ${loaded.path}`);
    return { written: [] };
  }
  if (loaded.status === "unreadable") {
    logger.error(`Failed to read ${loaded.path}: ${loaded.error}`);
    return { written: [] };
  }
  if (loaded.status === "missing_columns") {
    logger.error(`File ${loaded.path} missing required columns (${loaded.missing.join(", ")})`);
    return { written: [] };
  }

  loaded.errors.forEach((error) => logger.warn(`Skipped row ${error}`));
  if (loaded.records.length === 0) {
    logger.warn("No weather records loaded. Exiting pipeline.");
    return { written: [] };
  }

  // STEP 2: Clean
  const cleaning = cleanWeather(loaded.records);
  logger.info("Cleaned weather records", { records: cleaning.records.length, filled: cleaning.filled });

  // STEP 3: Aggregate
  const aggregates = aggregateWeather(cleaning.records);

  // STEP 4: Write the cleaned data and the summary
  const written: string[] = [];
  const outputs: Array<[string, string]> = [
    [CLEANED_FILE, cleanedWeatherCsv(cleaning.records)],
    [SUMMARY_FILE, renderWeatherSummary(aggregates, cleaning)],
  ];
  for (const [name, contents] of outputs) {
    const path = join(config.outputDir, name);
    await writeTextFile(path, contents);
    written.push(path);
  }

  // STEP 5: Charts, each rendered and logged on its own
  if (config.charts) {
    const charts = buildWeatherCharts(aggregates, cleaning.records);
    const pngs: Array<[string, Chart]> = [
      ["daily_temperature.png", charts.dailyTemperature],
      ["monthly_rainfall.png", charts.monthlyRainfall],
      ["humidity_vs_temperature.png", charts.humidityTemperature],
      ["weather_dashboard.png", charts.dashboard],
    ];
    for (const [name, chart] of pngs) {
      const path = join(config.outputDir, name);
      try {
        await savePng(chart, path);
        written.push(path);
      } catch (error) {
        logger.error("Failed to render chart", { path, error: errorMessage(error) });
      }
    }
  }

  logger.info("Weather pipeline finished", { files: written });
  return { aggregates, written };
}
