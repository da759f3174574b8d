import assert from "node:assert/strict";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { test } from "node:test";

import { Book } from "../src/library/book.ts";
import { LibraryInventory } from "../src/library/inventory.ts";
import { CatalogStore } from "../src/library/storage.ts";
import { captureLogger, withTempDir } from "./helpers.ts";

async function openInventory(dir: string) {
  const { logger, entries } = captureLogger();
  const store = new CatalogStore(join(dir, "books_catalog.json"), logger);
  const inventory = await LibraryInventory.open(store, logger);
  return { store, inventory, logger, entries };
}

test("Book trims its fields and starts available", () => {
  const book = new Book({ title: " Dune ", author: "Frank Herbert ", isbn: " 111 " });

  assert.deepEqual(book.toData(), { title: "Dune", author: "Frank Herbert", isbn: "111", status: "available" });
  assert.equal(book.toString(), "Dune by Frank Herbert (ISBN: 111) - available");
});

test("issuing an issued book fails and leaves it issued", () => {
  // Arrange
  const book = new Book({ title: "Dune", author: "Frank Herbert", isbn: "111" });

  // Act
  const first = book.issue();
  const second = book.issue();

  // Assert
  assert.equal(first.ok, true);
  assert.deepEqual(second, { ok: false, reason: "already_issued" });
  assert.equal(book.status, "issued");
});

test("returning an available book fails and leaves it available", () => {
  const book = new Book({ title: "Dune", author: "Frank Herbert", isbn: "111" });

  assert.deepEqual(book.returnBook(), { ok: false, reason: "not_issued" });
  assert.equal(book.status, "available");

  book.issue();
  assert.equal(book.returnBook().ok, true);
  assert.equal(book.isAvailable(), true);
});

test("addBook rejects a duplicate ISBN", async () => {
  await withTempDir(async (dir) => {
    const { inventory } = await openInventory(dir);

    await inventory.addBook(new Book({ title: "Dune", author: "Frank Herbert", isbn: "111" }));
    const result = await inventory.addBook(new Book({ title: "Other", author: "Someone", isbn: " 111" }));

    assert.deepEqual(result, { ok: false, reason: "duplicate" });
    assert.equal(inventory.listBooks().length, 1);
    assert.equal(inventory.listBooks()[0].title, "Dune");
  });
});

test("issue and return report conflicts without changing the catalog", async () => {
  await withTempDir(async (dir) => {
    const { inventory } = await openInventory(dir);
    await inventory.addBook(new Book({ title: "Dune", author: "Frank Herbert", isbn: "111" }));

    assert.deepEqual(await inventory.issueBook("999"), { ok: false, reason: "not_found" });
    assert.deepEqual(await inventory.returnBook("111"), { ok: false, reason: "not_issued" });
    assert.equal((await inventory.issueBook(" 111 ")).ok, true);
    assert.deepEqual(await inventory.issueBook("111"), { ok: false, reason: "already_issued" });
    assert.equal(inventory.searchByIsbn("111")?.status, "issued");
  });
});

test("searches match title substrings and exact ISBNs", async () => {
  await withTempDir(async (dir) => {
    const { inventory } = await openInventory(dir);
    await inventory.addBook(new Book({ title: "Dune", author: "Frank Herbert", isbn: "111" }));
    await inventory.addBook(new Book({ title: "Dune Messiah", author: "Frank Herbert", isbn: "222" }));
    await inventory.addBook(new Book({ title: "Emma", author: "Jane Austen", isbn: "333" }));

    assert.deepEqual(inventory.searchByTitle("  dUNe ").map((book) => book.isbn), ["111", "222"]);
    assert.deepEqual(inventory.searchByTitle("xyz"), []);
    assert.equal(inventory.searchByIsbn(" 333 ")?.title, "Emma");
    assert.equal(inventory.searchByIsbn("33"), undefined);
  });
});

test("saving then loading gives back the same catalog", async () => {
  await withTempDir(async (dir) => {
    // Arrange: two books, one of them issued
    const { inventory, store, logger } = await openInventory(dir);
    await inventory.addBook(new Book({ title: "Dune", author: "Frank Herbert", isbn: "111" }));
    await inventory.addBook(new Book({ title: "Emma", author: "Jane Austen", isbn: "333" }));
    await inventory.issueBook("333");

    // Act: a fresh store reads the file written by the mutations
    const reloaded = await new CatalogStore(store.path, logger).load();

    // Assert
    assert.deepEqual(reloaded.map((book) => book.toData()), inventory.listBooks().map((book) => book.toData()));
    assert.equal(reloaded[1].status, "issued");
  });
});

test("the catalog file is a two-space indented JSON array", async () => {
  await withTempDir(async (dir) => {
    const { inventory, store } = await openInventory(dir);
    await inventory.addBook(new Book({ title: "Dune", author: "Frank Herbert", isbn: "111" }));

    assert.equal(
      await readFile(store.path, "utf-8"),
      '[\n  {\n    "title": "Dune",\n    "author": "Frank Herbert",\n    "isbn": "111",\n    "status": "available"\n  }\n]\n',
    );
  });
});

test("a missing catalog file starts empty", async () => {
  await withTempDir(async (dir) => {
    const { inventory, entries } = await openInventory(dir);

    assert.equal(inventory.listBooks().length, 0);
    assert.ok(entries.some((entry) => entry.startsWith("INFO Catalog file not found")));
  });
});

test("a corrupt catalog file starts empty and logs an error", async () => {
  await withTempDir(async (dir) => {
    const { logger, entries } = captureLogger();
    const path = join(dir, "books_catalog.json");

    await writeFile(path, "{ not json", "utf-8");
    assert.deepEqual(await new CatalogStore(path, logger).load(), []);

    await writeFile(path, '{"title": "Dune"}', "utf-8");
    assert.deepEqual(await new CatalogStore(path, logger).load(), []);

    assert.equal(entries.filter((entry) => entry === "ERROR Starting with an empty catalog due to load error.").length, 2);
  });
});

test("an unreadable catalog path starts empty and logs an error", async () => {
  await withTempDir(async (dir) => {
    const { logger, entries } = captureLogger();

    const books = await new CatalogStore(dir, logger).load();

    assert.deepEqual(books, []);
    assert.ok(entries.some((entry) => entry.startsWith("ERROR Failed to load catalog") && entry.includes("EISDIR")));
    assert.ok(entries.includes("ERROR Starting with an empty catalog due to load error."));
  });
});

test("bad entries are skipped, unknown statuses reset, first duplicate kept", async () => {
  await withTempDir(async (dir) => {
    // Arrange
    const { logger, entries } = captureLogger();
    const path = join(dir, "books_catalog.json");
    await writeFile(path, JSON.stringify([
      { title: "Dune", author: "Frank Herbert", isbn: "111", status: "issued" },
      { title: "No ISBN", author: "Nobody" },
      "not a book",
      { title: "Emma", author: "Jane Austen", isbn: "333", status: "lost" },
      { title: "Dune copy", author: "Frank Herbert", isbn: "111", status: "available" },
      { isbn: "444" },
    ]), "utf-8");

    // Act
    const books = await new CatalogStore(path, logger).load();

    // Assert
    assert.deepEqual(books.map((book) => book.toData()), [
      { title: "Dune", author: "Frank Herbert", isbn: "111", status: "issued" },
      { title: "Emma", author: "Jane Austen", isbn: "333", status: "available" },
      { title: "", author: "", isbn: "444", status: "available" },
    ]);
    assert.equal(entries.filter((entry) => entry.startsWith("WARN Skipping invalid catalog entry")).length, 2);
    assert.ok(entries.includes('WARN Skipping duplicate ISBN in catalog {"index":4,"isbn":"111"}'));
  });
});
