import { loadEnergyConfig, loadEnvFile, reportConfigIssues } from "../config.ts";
// ^ ENERGY_DATA_DIR / ENERGY_OUTPUT_DIR / ENERGY_CHARTS, with defaults when unset.

import { isMainModule, runEntryPoint } from "../entry.ts";
import { createLogger } from "../logger.ts";
import { runEnergyPipeline } from "./pipeline.ts";

async function main() {
  loadEnvFile();
  const config = loadEnergyConfig();

  const logger = createLogger(config.logLevel, { filePath: config.logFilePath });
  // ^ Console plus output/ingest.log unless LOG_FILE_PATH points elsewhere.
  reportConfigIssues(process.env, logger);

  const result = await runEnergyPipeline(config, logger);
  if (result.written.length > 0) {
    console.log(`Outputs written to ${config.outputDir}:`);
    result.written.forEach((path) => console.log(`  ${path}`));
  }
}

if (isMainModule(import.meta.url)) {
  runEntryPoint(main);
}
