import type { Question } from "../domain/question/question.js";
import { QuestionBuilder } from "./questionBuilder.js";

export const CAPITAL = new QuestionBuilder().buildMcq();

export const PRIME = new QuestionBuilder()
  .withName("Which of these is a prime number?")
  .withImportance(3)
  .withTags("math")
  .withChoices("4", "6", "7")
  .buildMcq();

export const SORTING = new QuestionBuilder()
  .withName("Which sort is stable?")
  .withImportance(1)
  .withTags("algorithms", "sorting")
  .withChoices("Quick sort", "Heap sort", "Merge sort")
  .buildMcq();

export const EARTH_ROUND = new QuestionBuilder()
  .withName("The earth is round")
  .withImportance(5)
  .withTags()
  .buildTf(true);

/** Not in the typical list. */
export const OCEAN = new QuestionBuilder()
  .withName("Which is the largest ocean?")
  .withImportance(4)
  .withTags("geography")
  .withChoices("Atlantic", "Indian", "Pacific")
  .buildMcq();

export function getTypicalQuestions(): Question[] {
  return [CAPITAL, PRIME, SORTING, EARTH_ROUND];
}
