import { loadEnvFile, loadLibraryConfig, reportConfigIssues } from "../config.ts";
// ^ LIBRARY_CATALOG_PATH (books_catalog.json) and LIBRARY_LOG_PATH (library.log).

import { isMainModule, runEntryPoint } from "../entry.ts";
import { createLogger } from "../logger.ts";
import { ReadlinePrompter } from "../prompt.ts";
import { LibraryInventory } from "./inventory.ts";
import { runLibraryMenu } from "./menu.ts";
import { CatalogStore } from "./storage.ts";

async function main() {
  loadEnvFile();
  const config = loadLibraryConfig();

  const logger = createLogger(config.logLevel, { filePath: config.logFilePath });
  reportConfigIssues(process.env, logger);

  const inventory = await LibraryInventory.open(new CatalogStore(config.catalogPath, logger), logger);
  // ^ Missing or corrupt catalog files start an empty catalog instead of failing.

  const prompter = new ReadlinePrompter();
  try {
    await runLibraryMenu({ prompter, print: console.log, logger, inventory });
  } finally {
    prompter.close();
  }
}

if (isMainModule(import.meta.url)) {
  runEntryPoint(main);
}
