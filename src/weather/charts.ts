import { barChart, lineChart, scatterChart, stackCharts, type Chart } from "../chart.ts";
import { dayKey, parseTimestamp } from "../dates.ts";
import type { WeatherAggregates, WeatherRecord } from "./types.ts";

function formatDay(millis: number): string {
  return dayKey(new Date(millis));
}

export function dailyTemperatureChart(aggregates: WeatherAggregates): Chart {
  return lineChart({
    title: "Daily Mean Temperature",
    xLabel: "Date",
    yLabel: "Temperature (C)",
    series: [{
      label: "Temperature",
      points: aggregates.daily.map((day) => ({ x: parseTimestamp(day.day)?.getTime() ?? 0, y: day.temperature })),
    }],
    formatX: formatDay,
  });
}

export function monthlyRainfallChart(aggregates: WeatherAggregates): Chart {
  return barChart({
    title: "Monthly Rainfall",
    xLabel: "Month",
    yLabel: "Rainfall (mm)",
    bars: aggregates.monthly.map((month) => ({ label: month.month, value: month.totalRainfall })),
  });
}

export function humidityTemperatureChart(records: readonly WeatherRecord[]): Chart {
  return scatterChart({
    title: "Humidity vs Temperature",
    xLabel: "Temperature (C)",
    yLabel: "Humidity (%)",
    series: [{
      label: "Readings",
      points: records.map((record) => ({ x: record.temperature, y: record.humidity })),
    }],
  });
}

export interface WeatherCharts {
  dailyTemperature: Chart;
  monthlyRainfall: Chart;
  humidityTemperature: Chart;
  dashboard: Chart;
}

export function buildWeatherCharts(aggregates: WeatherAggregates, records: readonly WeatherRecord[]): WeatherCharts {
  const dailyTemperature = dailyTemperatureChart(aggregates);
  const monthlyRainfall = monthlyRainfallChart(aggregates);
  const humidityTemperature = humidityTemperatureChart(records);
  return {
    dailyTemperature,
    monthlyRainfall,
    humidityTemperature,
    dashboard: stackCharts("Weather Dashboard", [dailyTemperature, monthlyRainfall, humidityTemperature]),
  };
}
