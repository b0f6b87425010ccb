export const GRADE_COUNT = 5;
export const MIN_GRADE = 0;
export const MAX_GRADE = 4;

export type Half = "first" | "second";

export type HalfComparison = "higher" | "lower" | "same";

export interface HalfResult {
  half: Half;
  grades: number[];
  gpa: number;
  comparison: HalfComparison;
}

export type GoalEvaluation =
  | { kind: "alreadyMet"; goal: number }
  | { kind: "singleGrade"; goal: number; positions: number[] }
  | { kind: "multipleGrades"; goal: number; positions: number[] }
  | { kind: "unreachable"; goal: number };

export type SessionStage =
  | "start"
  | "collectingGrades"
  | "overallComputed"
  | "halfChosen"
  | "halfCompared"
  | "goalPrompted"
  | "goalEvaluated"
  | "end";

export interface SessionResult {
  grades: number[];
  gpa: number;
  half: HalfResult;
  evaluation: GoalEvaluation;
}
