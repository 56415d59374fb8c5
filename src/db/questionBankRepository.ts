import type { Question } from "../domain/question/question.js";

export interface QuestionBankRepository {
  countQuestions(): Promise<number>;
  /** Every stored question, in list order. */
  loadQuestions(): Promise<Question[]>;
  /** Replaces everything stored with `questions`, atomically. */
  saveQuestions(questions: readonly Question[]): Promise<void>;
  /** Like saveQuestions, and records that the bank was seeded. */
  seedQuestions(questions: readonly Question[]): Promise<void>;
  /** Whether the bank was ever seeded, however empty it is now. */
  isSeeded(): Promise<boolean>;
  markSeeded(): Promise<void>;
}
