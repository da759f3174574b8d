import { z } from "zod";

import { readTextFile, writeTextFile } from "../files.ts";
import { errorMessage, type Logger } from "../logger.ts";
import { validateWith } from "../validation.ts";
import { Book } from "./book.ts";
import { BOOK_STATUSES, type BookStatus } from "./types.ts";

function isBookStatus(value: unknown): value is BookStatus {
  return BOOK_STATUSES.some((status) => status === value);
}

// Missing title/author load as empty text; an entry without an ISBN can't be kept
const bookEntrySchema = z.object({
  title: z.string().default(""),
  author: z.string().default(""),
  isbn: z.string().trim().min(1, "must be a non-empty string"),
  status: z.unknown().optional(),
});

/**
 * Reads and writes the whole catalog as one JSON array. There is no partial update:
 * every save rewrites the file.
 */
export class CatalogStore {
  readonly path: string;
  #logger: Logger;

  constructor(path: string, logger: Logger) {
    this.path = path;
    this.#logger = logger;
  }

  /**
   * Load every book. A missing file is an empty catalog; so is a corrupt or
   * unreadable one, after an error is logged. Bad entries are skipped one by one.
   */
  async load(): Promise<Book[]> {
    const read = await readTextFile(this.path);
    if (read.status === "not_found") {
      this.#logger.info("Catalog file not found; starting with an empty catalog", { path: this.path });
      return [];
    }
    if (read.status === "failed") {
      this.#logger.error("Failed to load catalog", { path: this.path, error: read.error });
      this.#logger.error("Starting with an empty catalog due to load error.");
      return [];
    }

    let payload: unknown;
    try {
      payload = JSON.parse(read.text);
    } catch (error) {
      this.#logger.error("Failed to load catalog", { path: this.path, error: errorMessage(error) });
      this.#logger.error("Starting with an empty catalog due to load error.");
      return [];
    }

    if (!Array.isArray(payload)) {
      this.#logger.error("Failed to load catalog", { path: this.path, error: "Catalog root must be a list" });
      this.#logger.error("Starting with an empty catalog due to load error.");
      return [];
    }

    const books: Book[] = [];
    const seen = new Set<string>();

    payload.forEach((entry: unknown, index: number) => {
      const result = validateWith(bookEntrySchema, entry);
      if (!result.ok) {
        this.#logger.warn("Skipping invalid catalog entry", { index, errors: result.errors });
        return;
      }

      const { title, author, isbn, status } = result.value;
      if (seen.has(isbn)) {
        // First entry with an ISBN wins
        this.#logger.warn("Skipping duplicate ISBN in catalog", { index, isbn });
        return;
      }
      if (status !== undefined && !isBookStatus(status)) {
        this.#logger.debug("Unknown status; treating as available", { isbn, status });
      }

      seen.add(isbn);
      books.push(new Book({ title, author, isbn, status: isBookStatus(status) ? status : "available" }));
    });

    this.#logger.info("Loaded catalog", { path: this.path, books: books.length });
    return books;
  }

  async save(books: readonly Book[]): Promise<void> {
    const payload = books.map((book) => book.toData());
    await writeTextFile(this.path, `${JSON.stringify(payload, null, 2)}\n`);
    this.#logger.info("Saved catalog", { path: this.path, books: books.length });
  }
}
