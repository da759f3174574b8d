// One valid meter reading. Rows that can't produce one are dropped, never repaired.
export interface MeterReading {
  building: string;  // File name without ".csv", e.g. "library"
  timestamp: Date;   // UTC wall clock
  kwh: number;       // Finite and >= 0
}

// Per-building statistics for building_summary.csv
export interface BuildingSummary {
  building: string;
  count: number;
  mean: number;
  min: number;
  max: number;
  total: number;
}

// Campus consumption for one calendar bucket (day, week ending, hour)
export interface PeriodTotal {
  period: string;                       // "2025-01-06", "2025-01-12", "2025-01-06 08:00"
  byBuilding: Record<string, number>;   // Every building present, 0 when it had no readings
  campusTotal: number;                  // Sum over buildings
}

export interface BuildingAverage {
  building: string;
  average: number;
}

// Everything the summary and the dashboard are drawn from
export interface EnergyAggregates {
  buildings: string[];                  // Sorted names
  daily: PeriodTotal[];                 // Ascending by day
  weekly: PeriodTotal[];                // Weeks ending Sunday, ascending
  hourly: PeriodTotal[];                // Ascending by hour
  summaries: BuildingSummary[];         // Sorted by building name
  averageWeekly: BuildingAverage[];     // Highest first
}

export interface IngestResult {
  readings: MeterReading[];
  rowErrors: string[];    // Malformed rows that were skipped
  fileErrors: string[];   // Missing/unusable files that were skipped
  filesRead: number;      // Files that contributed a building (even with zero valid rows)
}
