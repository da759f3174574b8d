import { realpathSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

/**
 * True when the module at `moduleUrl` is the script Node was started with
 * (and not imported by a test or another module).
 */
export function isMainModule(moduleUrl: string): boolean {
  const script = process.argv[1];
  if (!script) return false;

  try {
    return realpathSync(resolve(script)) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    // argv[1] may name something that no longer resolves (e.g. a deleted temp script)
    return false;
  }
}

/**
 * Top-level fatal error handler shared by every tool.
 */
export function runEntryPoint(main: () => Promise<void>): void {
  main().catch((error) => {
    console.error("Fatal error", error);
    process.exitCode = 1;
  });
}
