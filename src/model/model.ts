import type { Question } from "../domain/question/question.js";
import type { UserPrefs } from "../domain/userPrefs.js";

export type QuestionPredicate = (question: Question) => boolean;

export const PREDICATE_SHOW_ALL_QUESTIONS: QuestionPredicate = () => true;

/**
 * Session state a command runs against: the question bank, the filter that
 * decides what the user currently sees, and the user's preferences.
 */
export interface Model {
  getUserPrefs(): UserPrefs;
  setUserPrefs(userPrefs: UserPrefs): void;
  getQuestionBankFile(): string;

  /** Snapshot of every question, for persistence. */
  getQuestionList(): readonly Question[];
  /** Replaces the whole bank; all-or-nothing. */
  setQuestions(questions: readonly Question[]): void;

  hasQuestion(question: Question): boolean;
  addQuestion(question: Question): void;
  deleteQuestion(target: Question): void;
  setQuestion(target: Question, editedQuestion: Question): void;

  /** The questions passing the active filter, in list order. */
  getFilteredQuestionList(): readonly Question[];
  updateFilteredQuestionList(predicate: QuestionPredicate): void;
}
