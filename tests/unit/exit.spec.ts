import { test, expect } from "@playwright/test";
import pino from "pino";
import { handleExit } from "../../src/cli/exit";
import { ConfigError, InputClosedError } from "../../src/errors";

function createCapture() {
  const printed: string[] = [];
  const logged: Record<string, unknown>[] = [];
  const log = pino(
    { level: "info" },
    {
      write: (entry: string) => {
        logged.push(JSON.parse(entry));
      },
    }
  );
  return { printed, logged, log, print: (line: string) => printed.push(line) };
}

test.describe("Exit handling", () => {
  test("should say goodbye and exit cleanly when input closes", () => {
    const { printed, logged, log, print } = createCapture();

    expect(handleExit(new InputClosedError(), print, log)).toBe(0);
    expect(printed).toEqual(["\nGoodbye."]);
    expect(logged).toEqual([]);
  });

  test("should log other errors and fail the process", () => {
    const { printed, logged, log, print } = createCapture();

    expect(handleExit(new ConfigError(["LOG_LEVEL: bad"]), print, log)).toBe(1);
    expect(printed).toEqual([]);
    expect(logged).toHaveLength(1);
    expect(logged[0]).toMatchObject({
      level: 50,
      msg: "Unhandled error",
      module: "index",
      error_message: "Invalid configuration: LOG_LEVEL: bad",
      error_type: "ConfigError",
    });
  });

  test("should wrap thrown values that are not errors", () => {
    const { logged, log, print } = createCapture();

    expect(handleExit("boom", print, log)).toBe(1);
    expect(logged[0]).toMatchObject({ error_message: "boom", error_type: "Error" });
  });
});
