import { errorMessage, type Logger } from "../logger.ts";
import { askNonEmpty, parseInteger, type Printer, type Prompter } from "../prompt.ts";
import { Book } from "./book.ts";
import type { LibraryInventory } from "./inventory.ts";
import type { ConflictReason } from "./types.ts";

export interface LibraryDeps {
  prompter: Prompter;
  print: Printer;
  logger: Logger;
  inventory: LibraryInventory;
}

const MENU = [
  "Library Inventory Manager",
  "-------------------------",
  "1) Add Book",
  "2) Issue Book",
  "3) Return Book",
  "4) View All Books",
  "5) Search by Title",
  "6) Search by ISBN",
  "7) Exit",
];

const CONFLICT_MESSAGES: Record<ConflictReason, string> = {
  not_found: "No book found with that ISBN.",
  already_issued: "That book is already issued.",
  not_issued: "That book is not currently issued.",
  duplicate: "Book with that ISBN already exists.",
};

// Sentinel for "input ended while an action was asking its questions"
const CLOSED = Symbol("closed");

async function addBook(deps: LibraryDeps): Promise<typeof CLOSED | void> {
  const { prompter, print, inventory } = deps;

  const title = await askNonEmpty(prompter, "Title: ", print);
  if (title === undefined) return CLOSED;
  const author = await askNonEmpty(prompter, "Author: ", print);
  if (author === undefined) return CLOSED;
  const isbn = await askNonEmpty(prompter, "ISBN: ", print);
  if (isbn === undefined) return CLOSED;

  const result = await inventory.addBook(new Book({ title, author, isbn }));
  print(result.ok ? "Book added." : CONFLICT_MESSAGES[result.reason]);
}

async function issueBook(deps: LibraryDeps): Promise<typeof CLOSED | void> {
  const isbn = await askNonEmpty(deps.prompter, "ISBN to issue: ", deps.print);
  if (isbn === undefined) return CLOSED;

  const result = await deps.inventory.issueBook(isbn);
  deps.print(result.ok ? "Book issued successfully." : CONFLICT_MESSAGES[result.reason]);
}

async function returnBook(deps: LibraryDeps): Promise<typeof CLOSED | void> {
  const isbn = await askNonEmpty(deps.prompter, "ISBN to return: ", deps.print);
  if (isbn === undefined) return CLOSED;

  const result = await deps.inventory.returnBook(isbn);
  deps.print(result.ok ? "Book returned successfully." : CONFLICT_MESSAGES[result.reason]);
}

function viewAll(deps: LibraryDeps): void {
  const books = deps.inventory.listBooks();
  if (books.length === 0) {
    deps.print("No books in the catalog.");
    return;
  }
  books.forEach((book, index) => deps.print(`${index + 1}. ${book.toString()}`));
}

async function searchTitle(deps: LibraryDeps): Promise<typeof CLOSED | void> {
  const query = await askNonEmpty(deps.prompter, "Title search query: ", deps.print);
  if (query === undefined) return CLOSED;

  const results = deps.inventory.searchByTitle(query);
  if (results.length === 0) {
    deps.print("No books matched your title query.");
    return;
  }
  deps.print(`Found ${results.length} result(s):`);
  results.forEach((book) => deps.print(book.toString()));
}

async function searchIsbn(deps: LibraryDeps): Promise<typeof CLOSED | void> {
  const isbn = await askNonEmpty(deps.prompter, "ISBN to search: ", deps.print);
  if (isbn === undefined) return CLOSED;

  const book = deps.inventory.searchByIsbn(isbn);
  deps.print(book ? book.toString() : "No book found with that ISBN.");
}

async function runAction(choice: number, deps: LibraryDeps): Promise<typeof CLOSED | void> {
  switch (choice) {
    case 1:
      return addBook(deps);
    case 2:
      return issueBook(deps);
    case 3:
      return returnBook(deps);
    case 4:
      return viewAll(deps);
    case 5:
      return searchTitle(deps);
    case 6:
      return searchIsbn(deps);
  }
}

/**
 * Menu loop. The catalog is saved after every change and once more on the way out,
 * whether the user picks Exit or input ends.
 */
export async function runLibraryMenu(deps: LibraryDeps): Promise<void> {
  const { prompter, print, logger, inventory } = deps;

  while (true) {
    print("");
    MENU.forEach((line) => print(line));

    const answer = await prompter.ask("Enter choice (1-7): ");
    if (answer === undefined) {
      print("Input closed. Saving catalog and exiting.");
      await inventory.save();
      return;
    }

    const text = answer.trim();
    if (!text) {
      print("Please enter a choice.");
      continue;
    }

    const choice = parseInteger(text);
    if (choice === undefined) {
      print("Invalid choice. Enter a number between 1 and 7.");
      continue;
    }
    if (choice < 1 || choice > 7) {
      print("Choice must be between 1 and 7.");
      continue;
    }

    if (choice === 7) {
      print("Goodbye. Saving catalog and exiting.");
      await inventory.save();
      return;
    }

    try {
      if ((await runAction(choice, deps)) === CLOSED) {
        print("Input closed. Saving catalog and exiting.");
        await inventory.save();
        return;
      }
    } catch (error) {
      // Keep the session alive; the change is in memory and the next save retries it
      logger.error("Library action failed", { choice, error: errorMessage(error) });
      print("An unexpected error occurred. Check the log file for details.");
    }
  }
}
