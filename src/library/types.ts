// A book is either on the shelf or lent out
export type BookStatus = "available" | "issued";
export const BOOK_STATUSES: readonly BookStatus[] = ["available", "issued"];

// The shape stored in books_catalog.json, one object per book
export interface BookData {
  title: string;
  author: string;
  isbn: string;       // Unique key, trimmed
  status: BookStatus;
}

// Why an operation left the catalog unchanged
export type ConflictReason =
  | "not_found"        // No book with that ISBN
  | "already_issued"   // issue() on an issued book
  | "not_issued"       // returnBook() on an available book
  | "duplicate";       // addBook() with an ISBN already in the catalog

// Same discriminated-union style as ValidationResult: check `ok` first
export type OperationResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: ConflictReason };
