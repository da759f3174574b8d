import type { BookData, BookStatus, OperationResult } from "./types.ts";

/**
 * One catalog entry. Status only moves available -> issued -> available;
 * a transition from the wrong state is refused and nothing changes.
 */
export class Book {
  readonly title: string;
  readonly author: string;
  readonly isbn: string;
  #status: BookStatus;

  constructor(data: { title: string; author: string; isbn: string; status?: BookStatus }) {
    this.title = data.title.trim();
    this.author = data.author.trim();
    this.isbn = data.isbn.trim();
    this.#status = data.status ?? "available";
  }

  get status(): BookStatus {
    return this.#status;
  }

  isAvailable(): boolean {
    return this.#status === "available";
  }

  issue(): OperationResult<Book> {
    if (this.#status !== "available") {
      return { ok: false, reason: "already_issued" };
    }
    this.#status = "issued";
    return { ok: true, value: this };
  }

  returnBook(): OperationResult<Book> {
    if (this.#status !== "issued") {
      return { ok: false, reason: "not_issued" };
    }
    this.#status = "available";
    return { ok: true, value: this };
  }

  toData(): BookData {
    return { title: this.title, author: this.author, isbn: this.isbn, status: this.#status };
  }

  // "Dune by Frank Herbert (ISBN: 978-0441013593) - available"
  toString(): string {
    return `${this.title} by ${this.author} (ISBN: ${this.isbn}) - ${this.#status}`;
  }
}
