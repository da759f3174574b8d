import { dayKey, hourKey, weekEndingKey } from "../dates.ts";
import { groupBy, mean, summarize, sum } from "../stats.ts";
import type {
  BuildingAverage,
  BuildingSummary,
  EnergyAggregates,
  MeterReading,
  PeriodTotal,
} from "./types.ts";

export function buildingNames(readings: readonly MeterReading[]): string[] {
  return [...new Set(readings.map((reading) => reading.building))].sort();
}

/**
 * Total kWh per building for every calendar bucket `key` produces, plus a campus total.
 * Buildings without readings in a bucket get 0. Buckets are ascending.
 */
export function periodTotals(
  readings: readonly MeterReading[],
  key: (timestamp: Date) => string,
): PeriodTotal[] {
  const buildings = buildingNames(readings);

  return [...groupBy(readings, (reading) => key(reading.timestamp))].map(([period, group]) => {
    // Summed in a Map so names like "__proto__" stay ordinary keys
    const totals = new Map(buildings.map((building): [string, number] => [building, 0]));
    for (const reading of group) {
      totals.set(reading.building, (totals.get(reading.building) ?? 0) + reading.kwh);
    }
    return { period, byBuilding: Object.fromEntries(totals), campusTotal: sum(group.map((reading) => reading.kwh)) };
  });
}

export function dailyTotals(readings: readonly MeterReading[]): PeriodTotal[] {
  return periodTotals(readings, dayKey);
}

// Weeks end on Sunday; the period label is that Sunday's date
export function weeklyTotals(readings: readonly MeterReading[]): PeriodTotal[] {
  return periodTotals(readings, weekEndingKey);
}

export function hourlyTotals(readings: readonly MeterReading[]): PeriodTotal[] {
  return periodTotals(readings, hourKey);
}

/**
 * Mean, min, max and total kWh per building, sorted by building name.
 */
export function buildingSummaries(readings: readonly MeterReading[]): BuildingSummary[] {
  const summaries: BuildingSummary[] = [];
  for (const [building, group] of groupBy(readings, (reading) => reading.building)) {
    const stats = summarize(group.map((reading) => reading.kwh));
    if (!stats) continue;
    summaries.push({
      building,
      count: stats.count,
      mean: stats.mean,
      min: stats.min,
      max: stats.max,
      total: stats.sum,
    });
  }
  return summaries;
}

/**
 * Average weekly kWh per building over all weeks in `weekly`, highest first
 * (ties by building name).
 */
export function averageWeeklyUsage(weekly: readonly PeriodTotal[]): BuildingAverage[] {
  const buildings = weekly.length > 0 ? Object.keys(weekly[0].byBuilding) : [];
  return buildings
    .map((building) => ({
      building,
      average: mean(weekly.map((week) => week.byBuilding[building] ?? 0)),
    }))
    .sort((a, b) => b.average - a.average || (a.building < b.building ? -1 : a.building > b.building ? 1 : 0));
}

/**
 * Bucket with the highest campus total. Ties go to the earliest bucket.
 */
export function peakPeriod(periods: readonly PeriodTotal[]): PeriodTotal | undefined {
  let peak: PeriodTotal | undefined;
  for (const period of periods) {
    if (!peak || period.campusTotal > peak.campusTotal) {
      peak = period;
    }
  }
  return peak;
}

/**
 * Building with the largest total. Ties go to the first name alphabetically.
 */
export function highestConsumer(summaries: readonly BuildingSummary[]): BuildingSummary | undefined {
  let top: BuildingSummary | undefined;
  for (const summary of summaries) {
    if (!top || summary.total > top.total) {
      top = summary;
    }
  }
  return top;
}

export function aggregateReadings(readings: readonly MeterReading[]): EnergyAggregates {
  const weekly = weeklyTotals(readings);
  return {
    buildings: buildingNames(readings),
    daily: dailyTotals(readings),
    weekly,
    hourly: hourlyTotals(readings),
    summaries: buildingSummaries(readings),
    averageWeekly: averageWeeklyUsage(weekly),
  };
}
