import { loadEnvFile, loadWeatherConfig, reportConfigIssues } from "../config.ts";
// ^ WEATHER_CSV_PATH / WEATHER_OUTPUT_DIR / WEATHER_CHARTS, with defaults when unset.

import { isMainModule, runEntryPoint } from "../entry.ts";
import { createLogger } from "../logger.ts";
import { runWeatherPipeline } from "./pipeline.ts";

async function main() {
  loadEnvFile();
  const config = loadWeatherConfig();

  const logger = createLogger(config.logLevel, { filePath: config.logFilePath });
  reportConfigIssues(process.env, logger);

  const result = await runWeatherPipeline(config, logger);
  // ^ "No data" is a normal finish: nothing written, exit code 0.
  if (result.written.length > 0) {
    console.log(`Outputs written to ${config.outputDir}:`);
    result.written.forEach((path) => console.log(`  ${path}`));
  }
}

if (isMainModule(import.meta.url)) {
  runEntryPoint(main);
}
