import type { Logger } from "pino";
import { InputClosedError } from "../errors";
import { GOODBYE_MESSAGE } from "../utils/narrator";
import type { Printer } from "./prompter";

/**
 * Turn whatever ended a run into an exit code. Input closing early is a
 * normal way out; anything else is logged and fails the process.
 */
export function handleExit(err: unknown, print: Printer, log: Logger): number {
  if (err instanceof InputClosedError) {
    print(`\n${GOODBYE_MESSAGE}`);
    return 0;
  }

  const error = err instanceof Error ? err : new Error(String(err));
  log.error(
    {
      module: "index",
      error_message: error.message,
      error_type: error.name,
      stack_trace: error.stack,
    },
    "Unhandled error"
  );
  return 1;
}
