import { z } from "zod";
import { ConfigError } from "./errors";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

export interface Config {
  logLevel: LogLevel;
}

const envSchema = z.object({
  // Logs share the terminal with the prompts, so only warnings by default
  // An empty LOG_LEVEL counts as unset
  LOG_LEVEL: z.preprocess(
    (value) => value || undefined,
    z.enum(LOG_LEVELS).default(DEFAULT_LOG_LEVEL)
  ),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  return { logLevel: parsed.data.LOG_LEVEL };
}
