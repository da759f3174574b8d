import { barChart, lineChart, scatterChart, stackCharts, type Chart, type Series } from "../chart.ts";
import { dayKey, parseTimestamp } from "../dates.ts";
import type { EnergyAggregates, PeriodTotal } from "./types.ts";

// Period labels ("2025-01-06", "2025-01-06 08:00") back to epoch millis for the x axis
function periodMillis(period: string): number {
  return parseTimestamp(period)?.getTime() ?? 0;
}

function seriesPerBuilding(buildings: readonly string[], periods: readonly PeriodTotal[]): Series[] {
  return buildings.map((building) => ({
    label: building,
    points: periods.map((period) => ({ x: periodMillis(period.period), y: period.byBuilding[building] ?? 0 })),
  }));
}

function formatDay(millis: number): string {
  return dayKey(new Date(millis));
}

/**
 * Three-panel dashboard: daily trend per building, average weekly usage per building,
 * and an hourly consumption scatter.
 */
export function buildEnergyDashboard(aggregates: EnergyAggregates): Chart {
  const trend = lineChart({
    title: "Daily Consumption Trend by Building",
    xLabel: "Date",
    yLabel: "kWh",
    series: seriesPerBuilding(aggregates.buildings, aggregates.daily),
    formatX: formatDay,
  });

  const weekly = barChart({
    title: "Average Weekly Usage per Building",
    xLabel: "Building",
    yLabel: "Average Weekly kWh",
    bars: aggregates.averageWeekly.map((entry) => ({ label: entry.building, value: entry.average })),
  });

  const hourly = scatterChart({
    title: "Hourly Consumption Scatter (per building)",
    xLabel: "Timestamp",
    yLabel: "kWh",
    series: seriesPerBuilding(aggregates.buildings, aggregates.hourly),
    formatX: formatDay,
  });

  return stackCharts("Campus Energy-Use Dashboard", [trend, weekly, hourly]);
}
