import { test, expect } from "@playwright/test";
import { parseGoal, parseGrade, parseHalf } from "../../src/utils/gradeInput";

test.describe("Grade input", () => {
  test("should accept grades inside 0.0 to 4.0", () => {
    expect(parseGrade("3.5")).toEqual({ isValid: true, value: 3.5 });
    expect(parseGrade(" 4 ")).toEqual({ isValid: true, value: 4 });
    expect(parseGrade("0")).toEqual({ isValid: true, value: 0 });
    expect(parseGrade(".5")).toEqual({ isValid: true, value: 0.5 });
  });

  test("should reject text that is not a number", () => {
    expect(parseGrade("abc")).toEqual({ isValid: false, errors: ["not a number"] });
    expect(parseGrade("")).toEqual({ isValid: false, errors: ["not a number"] });
    expect(parseGrade("1e0")).toEqual({ isValid: false, errors: ["not a number"] });
    expect(parseGrade("3.5.1")).toEqual({ isValid: false, errors: ["not a number"] });
  });

  test("should reject grades outside the range", () => {
    expect(parseGrade("5.0")).toEqual({ isValid: false, errors: ["above 4.0"] });
    expect(parseGrade("-1")).toEqual({ isValid: false, errors: ["below 0.0"] });
    expect(parseGrade("4.01")).toEqual({ isValid: false, errors: ["above 4.0"] });
  });
});

test.describe("Goal input", () => {
  test("should accept any number", () => {
    expect(parseGoal("3.8")).toEqual({ isValid: true, value: 3.8 });
    expect(parseGoal("5")).toEqual({ isValid: true, value: 5 });
  });

  test("should reject text that is not a number", () => {
    expect(parseGoal("high")).toEqual({ isValid: false, errors: ["not a number"] });
  });
});

test.describe("Half input", () => {
  test("should ignore case and surrounding spaces", () => {
    expect(parseHalf("first")).toEqual({ isValid: true, value: "first" });
    expect(parseHalf("First")).toEqual({ isValid: true, value: "first" });
    expect(parseHalf("  SECOND ")).toEqual({ isValid: true, value: "second" });
  });

  test("should reject anything else", () => {
    expect(parseHalf("third")).toEqual({
      isValid: false,
      errors: ["expected 'first' or 'second'"],
    });
  });
});
