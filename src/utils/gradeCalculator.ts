/**
 * GPA Calculator Utilities
 *
 * Pure functions for averaging grades, comparing semester halves and
 * working out which grades would have to be raised to reach a goal GPA.
 * All functions are side-effect free and thoroughly typed.
 */

import {
  MAX_GRADE,
  type GoalEvaluation,
  type Half,
  type HalfComparison,
  type HalfResult,
} from "../types/grades";

/**
 * Half means closer than this to the overall mean count as the same,
 * matching the two-decimal display.
 */
export const HALF_TOLERANCE = 0.005;

/**
 * Absorbs float noise when checking a projected mean against a goal
 */
export const GOAL_TOLERANCE = 1e-9;

/**
 * Round a value to 2 decimals
 */
export function roundToHundredths(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

/**
 * Arithmetic mean of a non-empty list of grades, unrounded
 */
export function averageGrades(grades: readonly number[]): number {
  if (grades.length === 0) {
    throw new Error("Cannot average an empty list of grades");
  }

  const total = grades.reduce((sum, grade) => sum + grade, 0);
  return total / grades.length;
}

/**
 * GPA as displayed: the mean rounded to 2 decimals
 */
export function calculateGpa(grades: readonly number[]): number {
  return roundToHundredths(averageGrades(grades));
}

/**
 * Split the grades into two contiguous halves.
 *
 * With an odd count the first half takes the extra grade, so five grades
 * split 3 / 2.
 */
export function splitHalves(grades: readonly number[]): Record<Half, number[]> {
  const firstHalfSize = Math.ceil(grades.length / 2);

  return {
    first: grades.slice(0, firstHalfSize),
    second: grades.slice(firstHalfSize),
  };
}

/**
 * Classify a half mean against the overall mean
 */
export function compareToOverall(
  halfMean: number,
  overallMean: number,
  tolerance: number = HALF_TOLERANCE
): HalfComparison {
  const difference = halfMean - overallMean;

  if (difference > tolerance) return "higher";
  if (difference < -tolerance) return "lower";
  return "same";
}

/**
 * Average the chosen half and compare it with the whole list
 */
export function evaluateHalf(grades: readonly number[], half: Half): HalfResult {
  const halfGrades = splitHalves(grades)[half];

  return {
    half,
    grades: halfGrades,
    gpa: calculateGpa(halfGrades),
    comparison: compareToOverall(averageGrades(halfGrades), averageGrades(grades)),
  };
}

/**
 * Mean of the grades with the grades at the given indexes raised to the maximum
 */
export function projectWithMaxedGrades(
  grades: readonly number[],
  indexes: readonly number[]
): number {
  const raised = grades.map((grade, index) =>
    indexes.includes(index) ? MAX_GRADE : grade
  );
  return averageGrades(raised);
}

function reachesGoal(mean: number, goal: number): boolean {
  return mean + GOAL_TOLERANCE >= goal;
}

/**
 * 1-indexed positions where raising that single grade to 4.0 reaches the goal
 */
export function findSingleGradeImprovements(
  grades: readonly number[],
  goal: number
): number[] {
  const positions: number[] = [];

  grades.forEach((_grade, index) => {
    if (reachesGoal(projectWithMaxedGrades(grades, [index]), goal)) {
      positions.push(index + 1);
    }
  });

  return positions;
}

/**
 * Smallest set of 1-indexed positions that reaches the goal when each is
 * raised to 4.0, or null when even a perfect list falls short.
 *
 * Lowest grades are raised first (ties go to the earlier position), which
 * gives the biggest gain per grade. Positions come back in ascending order.
 */
export function findMultipleGradeImprovements(
  grades: readonly number[],
  goal: number
): number[] | null {
  const byLowestGrade = grades
    .map((grade, index) => ({ grade, index }))
    .sort((a, b) => a.grade - b.grade || a.index - b.index);

  const chosen: number[] = [];
  if (reachesGoal(averageGrades(grades), goal)) return chosen;

  for (const { index } of byLowestGrade) {
    chosen.push(index);
    if (reachesGoal(projectWithMaxedGrades(grades, chosen), goal)) {
      return chosen.map((i) => i + 1).sort((a, b) => a - b);
    }
  }

  return null;
}

/**
 * Decide whether a goal GPA is already met, reachable by raising one grade,
 * reachable only by raising several, or out of reach
 */
export function evaluateGoal(grades: readonly number[], goal: number): GoalEvaluation {
  if (goal <= calculateGpa(grades)) {
    return { kind: "alreadyMet", goal };
  }

  if (goal > MAX_GRADE) {
    return { kind: "unreachable", goal };
  }

  const single = findSingleGradeImprovements(grades, goal);
  if (single.length > 0) {
    return { kind: "singleGrade", goal, positions: single };
  }

  const multiple = findMultipleGradeImprovements(grades, goal);
  if (multiple === null) {
    return { kind: "unreachable", goal };
  }

  return { kind: "multipleGrades", goal, positions: multiple };
}
