import { expect } from "vitest";
import type { Command } from "../commands/baseCommand.js";
import type { CommandResult } from "../commands/commandResult.js";
import type { Index } from "../domain/displayIndex.js";
import type { AppError } from "../domain/errors.js";
import type { Question } from "../domain/question/question.js";
import type { Model } from "../model/model.js";

export function expectSameQuestions(
  actual: readonly Question[],
  expected: readonly Question[]
): void {
  expect(actual.map(String)).toEqual(expected.map(String));
  actual.forEach((q, i) => expect(q.equals(expected[i])).toBe(true));
}

export function assertCommandSuccess(
  command: Command,
  model: Model,
  expectedMessage: string,
  expectedQuestions: readonly Question[]
): CommandResult {
  const result: CommandResult = command.execute(model);
  expect(result.feedbackToUser).toBe(expectedMessage);
  expectSameQuestions(model.getQuestionList(), expectedQuestions);
  return result;
}

/**
 * The command must fail with `errorType` and `expectedMessage`, leaving both
 * the bank and the filtered view exactly as they were.
 */
export function assertCommandFailure(
  command: Command,
  model: Model,
  errorType: new (message?: string) => AppError,
  expectedMessage: string
): void {
  const before: readonly Question[] = model.getQuestionList();
  const shownBefore: readonly Question[] = model.getFilteredQuestionList();

  expect(() => command.execute(model)).toThrow(errorType);
  expect(() => command.execute(model)).toThrow(expectedMessage);

  expect(model.getQuestionList()).toEqual(before);
  model.getQuestionList().forEach((q, i) => expect(q).toBe(before[i]));
  expect(model.getFilteredQuestionList()).toEqual(shownBefore);
}

/** Narrows the model's view to just the question at `index`. */
export function showQuestionAtIndex(model: Model, index: Index): void {
  const target: Question = model.getFilteredQuestionList()[index.getZeroBased()];
  model.updateFilteredQuestionList((q) => q.isSameQuestion(target));
  expect(model.getFilteredQuestionList()).toHaveLength(1);
}
