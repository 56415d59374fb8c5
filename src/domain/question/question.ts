import type { Choice } from "../choice.js";
import type { QuestionKind } from "../policy.js";
import type { Importance } from "./importance.js";
import type { MultipleChoiceQuestion } from "./multipleChoiceQuestion.js";
import type { Name } from "./name.js";
import type { QuestionDetails } from "./questionDetails.js";
import type { Tag } from "./tag.js";
import type { TrueFalseQuestion } from "./trueFalseQuestion.js";

/**
 * What the rest of the application may ask of any question, whatever its
 * variant.
 */
export interface QuestionCapabilities {
  readonly kind: QuestionKind;
  getName(): Name;
  getImportance(): Importance;
  getTags(): readonly Tag[];
  getChoices(): readonly Choice[];
  getAnswer(): Choice;
  /**
   * Business-key equality: two questions with the same name are the same
   * question even if every other field differs.
   */
  isSameQuestion(other: QuestionCapabilities): boolean;
  /** Full structural equality. */
  equals(other: unknown): boolean;
  /** A new question of the same variant with these details and the same choices. */
  withDetails(details: QuestionDetails): Question;
  toString(): string;
}

export type Question = MultipleChoiceQuestion | TrueFalseQuestion;

export function detailsOf(question: QuestionCapabilities): QuestionDetails {
  return {
    name: question.getName(),
    importance: question.getImportance(),
    tags: question.getTags(),
  };
}
