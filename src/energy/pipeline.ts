import { join } from "node:path";

import { savePng } from "../chart.ts";
import { writeTextFile } from "../files.ts";
import { errorMessage, type Logger } from "../logger.ts";
import type { EnergyConfig } from "../types.ts";
import { aggregateReadings } from "./aggregate.ts";
import { buildEnergyDashboard } from "./dashboard.ts";
import { ingestDirectory } from "./ingest.ts";
import { buildingSummaryCsv, cleanedReadingsCsv, renderEnergySummary } from "./report.ts";
import type { EnergyAggregates } from "./types.ts";

export const CLEANED_FILE = "cleaned_energy_data.csv";
export const SUMMARY_CSV_FILE = "building_summary.csv";
export const SUMMARY_TEXT_FILE = "summary.txt";
export const DASHBOARD_FILE = "dashboard.png";

export interface EnergyRunResult {
  aggregates?: EnergyAggregates;  // Undefined when nothing was loaded
  written: string[];              // Paths of the files this run produced
}

/**
 * Ingest -> aggregate -> write. Every output file is rewritten on each run.
 */
export async function runEnergyPipeline(config: EnergyConfig, logger: Logger): Promise<EnergyRunResult> {
  logger.info("Starting energy pipeline", { dataDir: config.dataDir, outputDir: config.outputDir });

  // STEP 1: Load every building's meter file
  const ingest = await ingestDirectory(config.dataDir, logger);
  ingest.fileErrors.forEach((error) => logger.error(error));
  ingest.rowErrors.forEach((error) => logger.warn(`Skipped row ${error}`));

  if (ingest.readings.length === 0) {
    logger.warn("No meter readings loaded. Exiting pipeline.");
    return { written: [] };
  }

  // STEP 2: Aggregate
  const aggregates = aggregateReadings(ingest.readings);
  logger.info("Aggregated readings", {
    readings: ingest.readings.length,
    buildings: aggregates.buildings.length,
    days: aggregates.daily.length,
    weeks: aggregates.weekly.length,
  });

  // STEP 3: Write the tabular and text outputs
  const written: string[] = [];
  const outputs: Array<[string, string]> = [
    [CLEANED_FILE, cleanedReadingsCsv(ingest.readings)],
    [SUMMARY_CSV_FILE, buildingSummaryCsv(aggregates.summaries)],
    [SUMMARY_TEXT_FILE, renderEnergySummary(aggregates)],
  ];
  for (const [name, contents] of outputs) {
    const path = join(config.outputDir, name);
    await writeTextFile(path, contents);
    written.push(path);
  }

  // STEP 4: Dashboard. A rendering failure is logged; the text outputs are already on disk.
  if (config.charts) {
    const path = join(config.outputDir, DASHBOARD_FILE);
    try {
      await savePng(buildEnergyDashboard(aggregates), path);
      written.push(path);
    } catch (error) {
      logger.error("Failed to render dashboard", { path, error: errorMessage(error) });
    }
  }

  logger.info("Energy pipeline finished", { files: written });
  return { aggregates, written };
}
