/**
 * Parsing for the answers typed at each prompt.
 *
 * Every parser returns a result instead of throwing, so the caller can
 * print a hint and ask again.
 */

import { z } from "zod";
import { MAX_GRADE, MIN_GRADE, type Half } from "../types/grades";

export type ParseResult<T> =
  | { isValid: true; value: T }
  | { isValid: false; errors: string[] };

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)$/;

const numberSchema = z
  .string()
  .trim()
  .regex(NUMBER_PATTERN, "not a number")
  .transform(Number);

export const gradeSchema = numberSchema.pipe(
  z
    .number()
    .min(MIN_GRADE, "below 0.0")
    .max(MAX_GRADE, "above 4.0")
);

export const goalSchema = numberSchema.pipe(z.number().finite("not a finite number"));

export const halfSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(
    z.enum(["first", "second"], {
      errorMap: () => ({ message: "expected 'first' or 'second'" }),
    })
  );

function toParseResult<T>(parsed: z.SafeParseReturnType<string, T>): ParseResult<T> {
  if (parsed.success) {
    return { isValid: true, value: parsed.data };
  }

  return {
    isValid: false,
    errors: parsed.error.issues.map((issue) => issue.message),
  };
}

/**
 * Parse a grade in the range 0.0 to 4.0
 */
export function parseGrade(raw: string): ParseResult<number> {
  return toParseResult(gradeSchema.safeParse(raw));
}

/**
 * Parse a goal GPA. Any finite number is accepted.
 */
export function parseGoal(raw: string): ParseResult<number> {
  return toParseResult(goalSchema.safeParse(raw));
}

/**
 * Parse a half selection, ignoring case and surrounding spaces
 */
export function parseHalf(raw: string): ParseResult<Half> {
  return toParseResult(halfSchema.safeParse(raw));
}
