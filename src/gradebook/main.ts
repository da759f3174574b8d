import { loadEnvFile, loadGradebookConfig, reportConfigIssues } from "../config.ts";
// ^ loadEnvFile reads .env (optional), loadGradebookConfig turns env vars into a typed config.

import { isMainModule, runEntryPoint } from "../entry.ts";
import { createLogger } from "../logger.ts";
import { ReadlinePrompter } from "../prompt.ts";
// ^ ReadlinePrompter wraps stdin so the menu can await one answer at a time.

import { runGradebookMenu } from "./menu.ts";

async function main() {
  loadEnvFile();
  const config = loadGradebookConfig();
  // ^ Throws early with every invalid setting listed (e.g. GRADEBOOK_PASS_MARK=140).

  const logger = createLogger(config.logLevel, { filePath: config.logFilePath });
  reportConfigIssues(process.env, logger);

  const prompter = new ReadlinePrompter();
  try {
    await runGradebookMenu({ prompter, print: console.log, logger, config });
  } finally {
    // ^ Always release stdin, even when the menu throws, so the process can exit.
    prompter.close();
  }
}

if (isMainModule(import.meta.url)) {
  runEntryPoint(main);
}
