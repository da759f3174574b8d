import sharp from "sharp";

import { writeBinaryFile } from "./files.ts";

/**
 * A rendered chart fragment. `body` is SVG markup drawn in a
 * `width` x `height` box with its origin at the top-left corner.
 */
export interface Chart {
  width: number;
  height: number;
  body: string;
}

export interface Point {
  x: number;
  y: number;
}

export interface Series {
  label: string;
  points: Point[];
}

export interface Bar {
  label: string;
  value: number;
}

export interface ChartOptions {
  title: string;
  xLabel: string;
  yLabel: string;
  width?: number;
  height?: number;
}

export interface XYChartOptions extends ChartOptions {
  series: Series[];
  formatX?: (x: number) => string;  // Tick labels, e.g. epoch millis -> "2025-01-06"
}

export interface BarChartOptions extends ChartOptions {
  bars: Bar[];
}

export interface HistogramOptions extends ChartOptions {
  values: number[];
  bins: number;
  range?: [number, number];  // Defaults to [min, max] of the values
}

const DEFAULT_WIDTH = 800;
const DEFAULT_HEIGHT = 400;
const MARGIN = { top: 40, right: 140, bottom: 60, left: 70 };
const Y_TICKS = 5;
const X_TICKS = 5;
const PALETTE = ["#1f77b4", "#ff7f0e", "#2ca02c", "#d62728", "#9467bd", "#8c564b", "#e377c2", "#7f7f7f"];

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

// Coordinates are written with one decimal
function n(value: number): string {
  return value.toFixed(1);
}

function colorAt(index: number): string {
  return PALETTE[index % PALETTE.length];
}

interface Scale {
  (value: number): number;
  domain: [number, number];
}

// Linear scale; a flat domain (all values equal) is widened so it still has height
function linearScale(domainMin: number, domainMax: number, rangeStart: number, rangeEnd: number): Scale {
  const [lo, hi] = domainMin === domainMax ? [domainMin - 1, domainMax + 1] : [domainMin, domainMax];
  const scale = (value: number) => rangeStart + ((value - lo) / (hi - lo)) * (rangeEnd - rangeStart);
  const domain: [number, number] = [lo, hi];
  return Object.assign(scale, { domain });
}

function formatTick(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

function frame(options: ChartOptions, width: number, height: number): string[] {
  return [
    `<rect x="0" y="0" width="${width}" height="${height}" fill="#ffffff"/>`,
    `<text x="${n(width / 2)}" y="24" text-anchor="middle" font-size="16" font-weight="bold">${escapeXml(options.title)}</text>`,
    `<text x="${n(MARGIN.left + (width - MARGIN.left - MARGIN.right) / 2)}" y="${n(height - 12)}" text-anchor="middle" font-size="12">${escapeXml(options.xLabel)}</text>`,
    `<text x="16" y="${n(height / 2)}" text-anchor="middle" font-size="12" transform="rotate(-90 16 ${n(height / 2)})">${escapeXml(options.yLabel)}</text>`,
  ];
}

function yAxis(scale: Scale, left: number, right: number): string[] {
  const [lo, hi] = scale.domain;
  const parts: string[] = [];
  for (let i = 0; i <= Y_TICKS; i += 1) {
    const value = lo + ((hi - lo) * i) / Y_TICKS;
    const y = scale(value);
    parts.push(`<line x1="${n(left)}" y1="${n(y)}" x2="${n(right)}" y2="${n(y)}" stroke="#e0e0e0"/>`);
    parts.push(`<text x="${n(left - 6)}" y="${n(y + 4)}" text-anchor="end" font-size="10">${escapeXml(formatTick(value))}</text>`);
  }
  return parts;
}

function legend(labels: string[], x: number, y: number): string[] {
  // A single unnamed series needs no legend
  if (labels.length < 2) return [];
  return labels.flatMap((label, index) => [
    `<rect x="${n(x)}" y="${n(y + index * 18)}" width="12" height="12" fill="${colorAt(index)}"/>`,
    `<text x="${n(x + 18)}" y="${n(y + index * 18 + 10)}" font-size="11">${escapeXml(label)}</text>`,
  ]);
}

function xyBounds(series: Series[]): { xMin: number; xMax: number; yMin: number; yMax: number } | undefined {
  const points = series.flatMap((s) => s.points);
  if (points.length === 0) return undefined;
  const xs = points.map((p) => p.x);
  const ys = points.map((p) => p.y);
  return {
    xMin: xs.reduce((a, b) => Math.min(a, b)),
    xMax: xs.reduce((a, b) => Math.max(a, b)),
    // Value axes start at zero unless the data goes negative
    yMin: Math.min(0, ys.reduce((a, b) => Math.min(a, b))),
    yMax: ys.reduce((a, b) => Math.max(a, b)),
  };
}

function xyChart(options: XYChartOptions, mark: (points: string[], color: string, series: Series) => string[]): Chart {
  const width = options.width ?? DEFAULT_WIDTH;
  const height = options.height ?? DEFAULT_HEIGHT;
  const parts = frame(options, width, height);
  const bounds = xyBounds(options.series);

  if (!bounds) {
    parts.push(`<text x="${n(width / 2)}" y="${n(height / 2)}" text-anchor="middle" font-size="12">No data</text>`);
    return { width, height, body: parts.join("") };
  }

  const left = MARGIN.left;
  const right = width - MARGIN.right;
  const top = MARGIN.top;
  const bottom = height - MARGIN.bottom;
  const xScale = linearScale(bounds.xMin, bounds.xMax, left, right);
  const yScale = linearScale(bounds.yMin, bounds.yMax, bottom, top);
  const formatX = options.formatX ?? formatTick;

  parts.push(...yAxis(yScale, left, right));
  const [xLo, xHi] = xScale.domain;
  for (let i = 0; i <= X_TICKS; i += 1) {
    const value = xLo + ((xHi - xLo) * i) / X_TICKS;
    parts.push(`<text x="${n(xScale(value))}" y="${n(bottom + 16)}" text-anchor="middle" font-size="10">${escapeXml(formatX(value))}</text>`);
  }
  parts.push(`<line x1="${n(left)}" y1="${n(bottom)}" x2="${n(right)}" y2="${n(bottom)}" stroke="#333333"/>`);
  parts.push(`<line x1="${n(left)}" y1="${n(top)}" x2="${n(left)}" y2="${n(bottom)}" stroke="#333333"/>`);

  options.series.forEach((series, index) => {
    const points = [...series.points]
      .sort((a, b) => a.x - b.x)
      .map((p) => `${n(xScale(p.x))},${n(yScale(p.y))}`);
    parts.push(...mark(points, colorAt(index), series));
  });

  parts.push(...legend(options.series.map((s) => s.label), right + 12, top));
  return { width, height, body: parts.join("") };
}

/**
 * One polyline per series, points joined in x order.
 */
export function lineChart(options: XYChartOptions): Chart {
  return xyChart(options, (points, color) => [
    `<polyline class="series" fill="none" stroke="${color}" stroke-width="2" points="${points.join(" ")}"/>`,
  ]);
}

/**
 * One dot per point, coloured by series.
 */
export function scatterChart(options: XYChartOptions): Chart {
  return xyChart(options, (points, color) =>
    points.map((point) => {
      const [cx, cy] = point.split(",");
      return `<circle class="point" cx="${cx}" cy="${cy}" r="3" fill="${color}"/>`;
    })
  );
}

/**
 * Vertical bars in the order given.
 */
export function barChart(options: BarChartOptions): Chart {
  const width = options.width ?? DEFAULT_WIDTH;
  const height = options.height ?? DEFAULT_HEIGHT;
  const parts = frame(options, width, height);

  if (options.bars.length === 0) {
    parts.push(`<text x="${n(width / 2)}" y="${n(height / 2)}" text-anchor="middle" font-size="12">No data</text>`);
    return { width, height, body: parts.join("") };
  }

  const left = MARGIN.left;
  const right = width - MARGIN.right;
  const top = MARGIN.top;
  const bottom = height - MARGIN.bottom;
  const values = options.bars.map((bar) => bar.value);
  const yScale = linearScale(
    Math.min(0, ...values),
    Math.max(0, ...values),
    bottom,
    top,
  );

  parts.push(...yAxis(yScale, left, right));

  const band = (right - left) / options.bars.length;
  const barWidth = band * 0.7;
  const zero = yScale(0);

  options.bars.forEach((bar, index) => {
    const x = left + band * index + (band - barWidth) / 2;
    const y = Math.min(yScale(bar.value), zero);
    const barHeight = Math.abs(yScale(bar.value) - zero);
    parts.push(`<rect class="bar" x="${n(x)}" y="${n(y)}" width="${n(barWidth)}" height="${n(barHeight)}" fill="${colorAt(0)}"/>`);
    parts.push(`<text x="${n(x + barWidth / 2)}" y="${n(bottom + 16)}" text-anchor="middle" font-size="10">${escapeXml(bar.label)}</text>`);
  });

  parts.push(`<line x1="${n(left)}" y1="${n(zero)}" x2="${n(right)}" y2="${n(zero)}" stroke="#333333"/>`);
  return { width, height, body: parts.join("") };
}

/**
 * Count values into `bins` equal-width buckets over [min, max].
 * The last bucket includes its upper edge; values outside the range are ignored.
 */
export function binValues(values: readonly number[], bins: number, min: number, max: number): Bar[] {
  const count = Math.max(1, Math.floor(bins));
  const step = max > min ? (max - min) / count : 1;
  const counts = new Array<number>(count).fill(0);

  for (const value of values) {
    if (value < min || value > max) continue;
    const index = Math.min(Math.floor((value - min) / step), count - 1);
    counts[index] += 1;
  }

  return counts.map((value, index) => {
    const lower = min + step * index;
    return { label: `${formatTick(lower)}-${formatTick(lower + step)}`, value };
  });
}

export function histogram(options: HistogramOptions): Chart {
  const [min, max] = options.range ?? [
    options.values.length > 0 ? options.values.reduce((a, b) => Math.min(a, b)) : 0,
    options.values.length > 0 ? options.values.reduce((a, b) => Math.max(a, b)) : 0,
  ];
  return barChart({ ...options, bars: options.values.length > 0 ? binValues(options.values, options.bins, min, max) : [] });
}

/**
 * Place charts under each other with an overall title, like a subplot grid with one column.
 */
export function stackCharts(title: string, charts: readonly Chart[]): Chart {
  const header = 40;
  const width = charts.reduce((acc, chart) => Math.max(acc, chart.width), 0);
  let offset = header;
  const parts = [
    `<rect x="0" y="0" width="${width}" height="${header}" fill="#ffffff"/>`,
    `<text x="${n(width / 2)}" y="28" text-anchor="middle" font-size="20" font-weight="bold">${escapeXml(title)}</text>`,
  ];

  for (const chart of charts) {
    parts.push(`<g transform="translate(0 ${offset})">${chart.body}</g>`);
    offset += chart.height;
  }

  return { width, height: offset, body: parts.join("") };
}

export function toSvg(chart: Chart): string {
  return `<svg xmlns="http://www.w3.org/2000/svg" width="${chart.width}" height="${chart.height}" viewBox="0 0 ${chart.width} ${chart.height}" font-family="sans-serif">${chart.body}</svg>`;
}

/**
 * Rasterize a chart to a PNG file (overwritten if present).
 */
export async function savePng(chart: Chart, path: string): Promise<void> {
  const png = await sharp(Buffer.from(toSvg(chart))).png().toBuffer();
  await writeBinaryFile(path, png);
}
