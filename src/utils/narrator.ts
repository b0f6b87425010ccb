/**
 * Narrator
 *
 * Fixed text printed around each step of a session.
 */

import type { GoalEvaluation, Half, HalfComparison } from "../types/grades";

export const BANNER_LINES = [
  "==============================",
  "   Welcome to GPA Goal Check",
  "==============================",
  "Lets get started",
];

export const CRUNCH_MESSAGE = "Calculating.. crunch";

export const CLOSING_MESSAGE = "Thanks for using GPA Goal Check. Good luck this semester!";

export const UNREACHABLE_MESSAGE =
  "Even raising every grade to 4.0 falls short: a GPA above 4.0 is not possible.";

export const GOODBYE_MESSAGE = "Goodbye.";

export const HALF_PROMPT = "Which half would you like to check? Type 'first' or 'second': ";

export const HALF_RETRY_MESSAGE = "Please type 'first' or 'second'.";

export const GOAL_PROMPT = "What's your goal GPA? ";

export const GOAL_RETRY_MESSAGE = "Please enter a numeric goal GPA.";

export function gradePrompt(position: number): string {
  return `Enter grade #${position} (0.0-4.0): `;
}

export function gradeRetryMessage(errors: readonly string[]): string {
  return `Invalid grade: ${errors.join(", ")}. Please enter a number between 0.0 and 4.0.`;
}

/**
 * Show a grade the way it was entered, keeping at least one decimal (4 -> 4.0)
 */
export function formatGrade(grade: number): string {
  return Number.isInteger(grade) ? grade.toFixed(1) : String(grade);
}

export function formatGpa(gpa: number): string {
  return gpa.toFixed(2);
}

export function formatGradeList(grades: readonly number[]): string {
  return `All grades recorded: [${grades.map(formatGrade).join(", ")}]`;
}

export function formatPositions(positions: readonly number[]): string {
  return `Try improving grade(s): ${positions.join(", ")}`;
}

export function currentGpaMessage(gpa: number): string {
  return `Your current GPA is: ${formatGpa(gpa)}`;
}

export function halfGpaMessage(half: Half, gpa: number): string {
  return `Your ${half} semester GPA is: ${formatGpa(gpa)}`;
}

export function getComparisonMessage(half: Half, comparison: HalfComparison): string {
  switch (comparison) {
    case "higher":
      return `Good job! Your ${half} semester is above your overall GPA.`;
    case "lower":
      return `Time to lock in! Your ${half} semester is below your overall GPA.`;
    case "same":
      return `Consistent work! Your ${half} semester matches your overall GPA.`;
  }
}

/**
 * Lines reporting the outcome of a goal evaluation
 */
export function getGoalMessages(evaluation: GoalEvaluation): string[] {
  const goal = formatGrade(evaluation.goal);
  const notSingleGrade = `Your goal of ${goal} is not achievable by changing a single grade. Try improving multiple grades.`;

  switch (evaluation.kind) {
    case "alreadyMet":
      return [`You already meet your goal GPA of ${goal}!`];
    case "singleGrade":
      return [
        `Your goal of ${goal} is achievable by raising one grade to 4.0.`,
        formatPositions(evaluation.positions),
      ];
    case "multipleGrades":
      return [notSingleGrade, formatPositions(evaluation.positions)];
    case "unreachable":
      return [notSingleGrade, UNREACHABLE_MESSAGE];
  }
}
