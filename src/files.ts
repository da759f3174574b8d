import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { errorMessage } from "./logger.ts";

export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export type TextReadResult =
  | { status: "ok"; text: string }
  | { status: "not_found" }
  | { status: "failed"; error: string };  // Exists but can't be read (a directory, no permission)

/**
 * Read a whole text file. Never throws: a missing file and an unreadable one
 * come back as their own statuses.
 */
export async function readTextFile(path: string): Promise<TextReadResult> {
  try {
    return { status: "ok", text: await readFile(path, "utf-8") };
  } catch (error) {
    if (isNotFoundError(error)) return { status: "not_found" };
    return { status: "failed", error: errorMessage(error) };
  }
}

async function ensureParentDir(path: string): Promise<void> {
  const dir = dirname(path);
  if (dir && dir !== ".") {
    await mkdir(dir, { recursive: true });  // like mkdir -p
  }
}

/**
 * Write a whole file, replacing whatever was there. Parent directories are created.
 */
export async function writeTextFile(path: string, contents: string): Promise<void> {
  await ensureParentDir(path);
  await writeFile(path, contents, "utf-8");
}

export async function writeBinaryFile(path: string, contents: Uint8Array): Promise<void> {
  await ensureParentDir(path);
  await writeFile(path, contents);
}
