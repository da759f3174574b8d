import type { Logger } from "../logger.ts";
import type { Book } from "./book.ts";
import type { CatalogStore } from "./storage.ts";
import type { OperationResult } from "./types.ts";

/**
 * In-memory catalog backed by a CatalogStore. Each successful change is saved
 * straight away; a refused change leaves both memory and file untouched.
 */
export class LibraryInventory {
  #books: Book[];
  #store: CatalogStore;
  #logger: Logger;

  constructor(books: readonly Book[], store: CatalogStore, logger: Logger) {
    this.#books = [...books];
    this.#store = store;
    this.#logger = logger;
  }

  static async open(store: CatalogStore, logger: Logger): Promise<LibraryInventory> {
    return new LibraryInventory(await store.load(), store, logger);
  }

  async addBook(book: Book): Promise<OperationResult<Book>> {
    if (this.searchByIsbn(book.isbn)) {
      this.#logger.warn("Book with ISBN already exists; skipping add", { isbn: book.isbn });
      return { ok: false, reason: "duplicate" };
    }

    this.#books.push(book);
    this.#logger.info("Added book", { book: book.toString() });
    await this.save();
    return { ok: true, value: book };
  }

  // Case-insensitive substring match, catalog order
  searchByTitle(query: string): Book[] {
    const needle = query.trim().toLowerCase();
    return this.#books.filter((book) => book.title.toLowerCase().includes(needle));
  }

  searchByIsbn(isbn: string): Book | undefined {
    const key = isbn.trim();
    return this.#books.find((book) => book.isbn === key);
  }

  async issueBook(isbn: string): Promise<OperationResult<Book>> {
    return this.#transition(isbn, "issue", (book) => book.issue());
  }

  async returnBook(isbn: string): Promise<OperationResult<Book>> {
    return this.#transition(isbn, "return", (book) => book.returnBook());
  }

  listBooks(): readonly Book[] {
    return this.#books;
  }

  async save(): Promise<void> {
    await this.#store.save(this.#books);
  }

  async #transition(
    isbn: string,
    action: "issue" | "return",
    apply: (book: Book) => OperationResult<Book>,
  ): Promise<OperationResult<Book>> {
    const book = this.searchByIsbn(isbn);
    if (!book) {
      this.#logger.info(`${action} failed; ISBN not found`, { isbn: isbn.trim() });
      return { ok: false, reason: "not_found" };
    }

    const result = apply(book);
    if (!result.ok) {
      this.#logger.warn(`${action} refused`, { book: book.toString(), reason: result.reason });
      return result;
    }

    this.#logger.info(action === "issue" ? "Book issued" : "Book returned", { book: book.toString() });
    await this.save();
    return result;
  }
}
