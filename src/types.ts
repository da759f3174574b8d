// Shared shapes used by every tool in the toolkit.
// Tool-specific records live next to each tool (gradebook/types.ts, energy/types.ts, ...).

// LogLevel controls what gets logged to the console and the log file
export type LogLevel = "debug" | "info" | "warn" | "error";
// debug = everything (very verbose)
// info = normal operations
// warn = skipped rows, missing optional inputs
// error = missing files, failed writes

// ValidationResult is a "discriminated union" - check the `ok` field to know which case
// Loaders return one of these per row instead of throwing
export type ValidationResult<T> =
  | { ok: true; value: T }          // Success: contains validated data
  | { ok: false; errors: string[] }; // Failure: contains error messages

// LoadResult is what every loader hands back: the good records plus
// human-friendly messages about everything that was skipped
export interface LoadResult<T> {
  records: T[];
  errors: string[];
}

// SummaryStats is the Aggregator's scalar output for a list of numbers
export interface SummaryStats {
  count: number;   // How many values went in
  mean: number;    // Arithmetic mean
  median: number;  // Sorted middle (or average of the two middles)
  min: number;
  max: number;
  sum: number;
  stdDev: number;  // Population standard deviation
}

// Settings every tool reads regardless of what it does
export interface CommonConfig {
  logLevel: LogLevel;
  logFilePath?: string;  // Optional: also append log lines to this file
}

export interface GradebookConfig extends CommonConfig {
  reportPath?: string;   // Optional: write the analysis report here (overwritten each run)
  chartDir?: string;     // Optional: write grade charts into this directory
  passMark: number;      // Minimum marks for a pass, 40 by default
}

export interface EnergyConfig extends CommonConfig {
  dataDir: string;       // Directory holding one CSV per building
  outputDir: string;     // Where cleaned data, summaries and the dashboard go
  charts: boolean;       // false skips PNG rendering
}

export interface LibraryConfig extends CommonConfig {
  catalogPath: string;   // The single JSON catalog file
}

export interface WeatherConfig extends CommonConfig {
  csvPath: string;       // Raw weather CSV
  outputDir: string;
  charts: boolean;
}
