import pino from "pino";
import { DEFAULT_LOG_LEVEL, type LogLevel } from "./config";

export function createLogger(level: LogLevel) {
  // stderr, so the transcript on stdout is left alone
  return pino({ name: "gpa-goal-check", level }, pino.destination(2));
}

// The entry point applies LOG_LEVEL once the configuration has loaded
export const logger = createLogger(DEFAULT_LOG_LEVEL);
