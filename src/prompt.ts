import { createInterface, type Interface } from "node:readline";

/**
 * Source of interactive answers. `ask` resolves to undefined once input has
 * ended (Ctrl-D, closed pipe), which menus treat as "exit".
 */
export interface Prompter {
  ask(question: string): Promise<string | undefined>;
  close(): void;
}

// Where menus print their text. console.log by default, an array push in tests.
export type Printer = (line: string) => void;

/**
 * Prompter backed by a readline interface over stdin.
 */
export class ReadlinePrompter implements Prompter {
  #rl: Interface;
  #lines: AsyncIterator<string>;
  #output: NodeJS.WritableStream;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.#rl = createInterface({ input, crlfDelay: Infinity });
    // Create the iterator up front so piped lines that arrive early are buffered
    this.#lines = this.#rl[Symbol.asyncIterator]();
    this.#output = output;
  }

  async ask(question: string): Promise<string | undefined> {
    this.#output.write(question);
    const next = await this.#lines.next();
    return next.done ? undefined : next.value;
  }

  close(): void {
    this.#rl.close();
  }
}

/**
 * Ask until the answer is non-empty after trimming.
 */
export async function askNonEmpty(
  prompter: Prompter,
  question: string,
  print: Printer,
): Promise<string | undefined> {
  while (true) {
    const answer = await prompter.ask(question);
    if (answer === undefined) return undefined;

    const value = answer.trim();
    if (value) return value;
    print("Input cannot be empty. Please try again.");
  }
}

/**
 * Ask until the answer is a whole number inside [min, max].
 */
export async function askInteger(
  prompter: Prompter,
  question: string,
  print: Printer,
  range: { min: number; max: number },
): Promise<number | undefined> {
  while (true) {
    const answer = await prompter.ask(question);
    if (answer === undefined) return undefined;

    const parsed = parseInteger(answer);
    if (parsed !== undefined && parsed >= range.min && parsed <= range.max) {
      return parsed;
    }
    print(`Please enter a whole number between ${range.min} and ${range.max}.`);
  }
}

/**
 * Strict integer parsing: "42" -> 42, but "42abc", "4.2" and "" -> undefined.
 */
export function parseInteger(text: string): number | undefined {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return undefined;
  return Number(trimmed);
}
