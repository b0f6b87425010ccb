import { createInterface, type Interface } from "node:readline";
import { InputClosedError } from "../errors";

/**
 * Asks one question at a time and resolves with the raw answer
 */
export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

export type Printer = (line: string) => void;

export const consolePrinter: Printer = (line) => {
  process.stdout.write(`${line}\n`);
};

/**
 * Prompter over a readline interface. Lines typed (or piped) ahead of a
 * question are queued, and end of input rejects with InputClosedError.
 */
export class ReadlinePrompter implements Prompter {
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
    terminal?: boolean
  ) {
    this.rl = createInterface({ input, output, terminal });
    this.rl.on("close", () => {
      this.closed = true;
    });
    // Ctrl+C ends input the same way Ctrl+D does
    this.rl.on("SIGINT", () => this.rl.close());
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async ask(question: string): Promise<string> {
    // Piped input can close the interface while answers are still queued
    if (this.closed) {
      this.output.write(question);
    } else {
      this.rl.setPrompt(question);
      this.rl.prompt();
    }

    const next = await this.lines.next();
    if (next.done) {
      throw new InputClosedError();
    }
    return next.value;
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}
