import assert from "node:assert/strict";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { test } from "node:test";

import { LibraryInventory } from "../src/library/inventory.ts";
import { runLibraryMenu } from "../src/library/menu.ts";
import { CatalogStore } from "../src/library/storage.ts";
import { captureLogger, ScriptedPrompter, withTempDir } from "./helpers.ts";

async function runMenu(dir: string, answers: string[]) {
  const printed: string[] = [];
  const { logger } = captureLogger();
  const catalogPath = join(dir, "books_catalog.json");
  const inventory = await LibraryInventory.open(new CatalogStore(catalogPath, logger), logger);

  await runLibraryMenu({ prompter: new ScriptedPrompter(answers), print: (line) => printed.push(line), logger, inventory });
  return { printed, inventory, catalogPath };
}

test("add, issue, return and search through the menu", async () => {
  await withTempDir(async (dir) => {
    // Arrange
    const answers = [
      "1", "Dune", "Frank Herbert", "111",
      "1", "Other", "Someone", "111",
      "2", "111",
      "2", "111",
      "3", "111",
      "3", "111",
      "5", "dune",
      "6", "999",
      "7",
    ];

    // Act
    const { printed, catalogPath } = await runMenu(dir, answers);

    // Assert: every outcome message appears in order
    const outcomes = printed.filter((line) => !line.startsWith("-") && !/^\d\) /.test(line) && line !== "" && line !== "Library Inventory Manager");
    assert.deepEqual(outcomes, [
      "Book added.",
      "Book with that ISBN already exists.",
      "Book issued successfully.",
      "That book is already issued.",
      "Book returned successfully.",
      "That book is not currently issued.",
      "Found 1 result(s):",
      "Dune by Frank Herbert (ISBN: 111) - available",
      "No book found with that ISBN.",
      "Goodbye. Saving catalog and exiting.",
    ]);

    const saved = JSON.parse(await readFile(catalogPath, "utf-8"));
    assert.deepEqual(saved, [{ title: "Dune", author: "Frank Herbert", isbn: "111", status: "available" }]);
  });
});

test("view all lists books with numbers", async () => {
  await withTempDir(async (dir) => {
    const { printed } = await runMenu(dir, ["4", "1", "Emma", "Jane Austen", "333", "4", "7"]);

    assert.ok(printed.includes("No books in the catalog."));
    assert.ok(printed.includes("1. Emma by Jane Austen (ISBN: 333) - available"));
  });
});

test("bad choices and empty answers are reprompted", async () => {
  await withTempDir(async (dir) => {
    const { printed, inventory } = await runMenu(dir, ["", "abc", "9", "1", "", "Emma", "Jane Austen", "333", "7"]);

    assert.ok(printed.includes("Please enter a choice."));
    assert.ok(printed.includes("Invalid choice. Enter a number between 1 and 7."));
    assert.ok(printed.includes("Choice must be between 1 and 7."));
    assert.ok(printed.includes("Input cannot be empty. Please try again."));
    assert.equal(inventory.listBooks().length, 1);
  });
});

test("end of input saves the catalog and exits", async () => {
  await withTempDir(async (dir) => {
    const { printed, catalogPath } = await runMenu(dir, ["1", "Emma"]);

    assert.equal(printed[printed.length - 1], "Input closed. Saving catalog and exiting.");
    assert.equal(await readFile(catalogPath, "utf-8"), "[]\n");
  });
});
