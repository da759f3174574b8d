import { toCsv } from "../csv.ts";
import { formatDateTime } from "../dates.ts";
import { mean, sum } from "../stats.ts";
import { formatNumber } from "../table.ts";
import { highestConsumer, peakPeriod } from "./aggregate.ts";
import type { BuildingSummary, EnergyAggregates, MeterReading } from "./types.ts";

/**
 * cleaned_energy_data.csv: every kept reading, ordered by timestamp then building.
 */
export function cleanedReadingsCsv(readings: readonly MeterReading[]): string {
  return toCsv([
    ["timestamp", "building", "kwh"],
    ...readings.map((reading) => [formatDateTime(reading.timestamp), reading.building, String(reading.kwh)]),
  ]);
}

/**
 * building_summary.csv: one line per building.
 */
export function buildingSummaryCsv(summaries: readonly BuildingSummary[]): string {
  return toCsv([
    ["building", "mean", "min", "max", "total"],
    ...summaries.map((summary) => [
      summary.building,
      formatNumber(summary.mean),
      formatNumber(summary.min),
      formatNumber(summary.max),
      formatNumber(summary.total),
    ]),
  ]);
}

/**
 * Plain-text executive summary (summary.txt).
 */
export function renderEnergySummary(aggregates: EnergyAggregates): string {
  const lines: string[] = [];

  const campusTotal = sum(aggregates.daily.map((day) => day.campusTotal));
  lines.push(`Total campus consumption (from daily totals): ${formatNumber(campusTotal)} kWh`);

  const top = highestConsumer(aggregates.summaries);
  lines.push(top
    ? `Highest-consuming building: ${top.building} (${formatNumber(top.total)} kWh total)`
    : "Highest-consuming building: N/A");

  const peakWeek = peakPeriod(aggregates.weekly);
  if (peakWeek) {
    lines.push(`Week with highest campus load (week-ending): ${peakWeek.period} (${formatNumber(peakWeek.campusTotal)} kWh)`);
  }

  const peakDay = peakPeriod(aggregates.daily);
  if (peakDay) {
    lines.push(`Day with highest campus load: ${peakDay.period} (${formatNumber(peakDay.campusTotal)} kWh)`);
  }

  const peakHour = peakPeriod(aggregates.hourly);
  if (peakHour) {
    lines.push(`Peak hour of campus load: ${peakHour.period} (${formatNumber(peakHour.campusTotal)} kWh)`);
  }

  if (aggregates.weekly.length > 0) {
    const averageWeekly = mean(aggregates.weekly.map((week) => week.campusTotal));
    lines.push(`Average weekly campus consumption: ${formatNumber(averageWeekly)} kWh`);
  }

  lines.push("");
  lines.push("Building summary:");
  for (const summary of aggregates.summaries) {
    lines.push(
      `- ${summary.building}: total ${formatNumber(summary.total)} kWh, ` +
        `mean ${formatNumber(summary.mean)}, min ${formatNumber(summary.min)}, max ${formatNumber(summary.max)} ` +
        `(${summary.count} readings)`,
    );
  }

  lines.push("");
  lines.push("Observations and suggestions:");
  lines.push("- Investigate highest-consuming buildings for HVAC or lighting optimization.");
  lines.push("- Target peak hours for demand-side management or load shifting.");

  return `${lines.join("\n")}\n`;
}
