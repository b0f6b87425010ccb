import type { Logger } from "pino";
import { logger as defaultLogger } from "../logger";
import {
  GRADE_COUNT,
  type GoalEvaluation,
  type HalfResult,
  type SessionResult,
  type SessionStage,
} from "../types/grades";
import { calculateGpa, evaluateGoal, evaluateHalf } from "../utils/gradeCalculator";
import { parseGoal, parseGrade, parseHalf, type ParseResult } from "../utils/gradeInput";
import {
  BANNER_LINES,
  CLOSING_MESSAGE,
  CRUNCH_MESSAGE,
  GOAL_PROMPT,
  GOAL_RETRY_MESSAGE,
  HALF_PROMPT,
  HALF_RETRY_MESSAGE,
  currentGpaMessage,
  formatGradeList,
  getComparisonMessage,
  getGoalMessages,
  gradePrompt,
  gradeRetryMessage,
  halfGpaMessage,
} from "../utils/narrator";
import type { Printer, Prompter } from "./prompter";

/**
 * One run of the GPA check, from the welcome banner to the closing line.
 *
 * Stages only move forward:
 * start → collectingGrades → overallComputed → halfChosen → halfCompared
 * → goalPrompted → goalEvaluated → end
 */
export class GpaSession {
  private currentStage: SessionStage = "start";

  constructor(
    private readonly prompter: Prompter,
    private readonly print: Printer,
    private readonly log: Logger = defaultLogger
  ) {}

  get stage(): SessionStage {
    return this.currentStage;
  }

  async run(): Promise<SessionResult> {
    if (this.currentStage !== "start") {
      throw new Error(`Session already ran (stage: ${this.currentStage})`);
    }

    BANNER_LINES.forEach((line) => this.print(line));

    this.moveTo("collectingGrades");
    const grades = await this.collectGrades();

    this.print(CRUNCH_MESSAGE);
    const gpa = calculateGpa(grades);
    this.print(currentGpaMessage(gpa));
    this.moveTo("overallComputed");

    const half = await this.compareHalf(grades);
    const evaluation = await this.checkGoal(grades);

    this.print(CLOSING_MESSAGE);
    this.moveTo("end");

    this.log.info(
      {
        module: "cli.session",
        gpa,
        half: half.half,
        comparison: half.comparison,
        outcome: evaluation.kind,
      },
      "Session complete"
    );

    return { grades, gpa, half, evaluation };
  }

  private async collectGrades(): Promise<number[]> {
    const grades: number[] = [];

    for (let position = 1; position <= GRADE_COUNT; position++) {
      grades.push(
        await this.askUntilValid(gradePrompt(position), parseGrade, gradeRetryMessage)
      );
    }

    this.print(formatGradeList(grades));
    return grades;
  }

  private async compareHalf(grades: number[]): Promise<HalfResult> {
    const half = await this.askUntilValid(HALF_PROMPT, parseHalf, () => HALF_RETRY_MESSAGE);
    this.moveTo("halfChosen");

    const result = evaluateHalf(grades, half);
    this.print(halfGpaMessage(result.half, result.gpa));
    this.print(getComparisonMessage(result.half, result.comparison));
    this.moveTo("halfCompared");

    return result;
  }

  private async checkGoal(grades: number[]): Promise<GoalEvaluation> {
    this.moveTo("goalPrompted");
    const goal = await this.askUntilValid(GOAL_PROMPT, parseGoal, () => GOAL_RETRY_MESSAGE);

    const evaluation = evaluateGoal(grades, goal);
    getGoalMessages(evaluation).forEach((line) => this.print(line));
    this.moveTo("goalEvaluated");

    return evaluation;
  }

  /**
   * Ask the same question until the answer parses
   */
  private async askUntilValid<T>(
    question: string,
    parse: (raw: string) => ParseResult<T>,
    retryMessage: (errors: string[]) => string
  ): Promise<T> {
    for (;;) {
      const raw = await this.prompter.ask(question);
      const parsed = parse(raw);

      if (parsed.isValid) {
        return parsed.value;
      }

      this.log.debug(
        { module: "cli.session", stage: this.currentStage, input: raw, errors: parsed.errors },
        "Invalid input"
      );
      this.print(retryMessage(parsed.errors));
    }
  }

  private moveTo(stage: SessionStage): void {
    this.log.debug(
      { module: "cli.session", from: this.currentStage, to: stage },
      "Stage changed"
    );
    this.currentStage = stage;
  }
}
