/**
 * Raised by a prompter when its input ends (EOF, Ctrl+D or Ctrl+C)
 * before a question is answered.
 */
export class InputClosedError extends Error {
  constructor(message = "Input closed before an answer was given") {
    super(message);
    this.name = "InputClosedError";
  }
}

/**
 * Raised when the environment holds an invalid setting
 */
export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}
