#!/usr/bin/env node
import { handleExit } from "./cli/exit";
import { consolePrinter, ReadlinePrompter } from "./cli/prompter";
import { GpaSession } from "./cli/session";
import { loadConfig } from "./config";
import { logger } from "./logger";

async function main(): Promise<void> {
  logger.level = loadConfig().logLevel;

  const prompter = new ReadlinePrompter();

  try {
    await new GpaSession(prompter, consolePrinter).run();
  } finally {
    prompter.close();
  }
}

main().catch((err: unknown) => {
  process.exitCode = handleExit(err, consolePrinter, logger);
});
