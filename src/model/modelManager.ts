import type { Question } from "../domain/question/question.js";
import { UniqueQuestionList } from "../domain/questionList.js";
import { DEFAULT_USER_PREFS, type UserPrefs } from "../domain/userPrefs.js";
import { logger } from "../logger.js";
import {
  PREDICATE_SHOW_ALL_QUESTIONS,
  type Model,
  type QuestionPredicate,
} from "./model.js";

export class ModelManager implements Model {
  readonly #questions: UniqueQuestionList = new UniqueQuestionList();
  #predicate: QuestionPredicate = PREDICATE_SHOW_ALL_QUESTIONS;
  #userPrefs: UserPrefs;

  public constructor(
    questions: readonly Question[] = [],
    userPrefs: UserPrefs = DEFAULT_USER_PREFS
  ) {
    this.#questions.setAll(questions);
    this.#userPrefs = Object.freeze({ ...userPrefs });
    logger.debug(
      `Model initialised with ${questions.length} questions from ${userPrefs.questionBankFile}`
    );
  }

  public getUserPrefs(): UserPrefs {
    return this.#userPrefs;
  }

  public setUserPrefs(userPrefs: UserPrefs): void {
    this.#userPrefs = Object.freeze({ ...userPrefs });
  }

  public getQuestionBankFile(): string {
    return this.#userPrefs.questionBankFile;
  }

  public getQuestionList(): readonly Question[] {
    return this.#questions.asReadonlyList();
  }

  public setQuestions(questions: readonly Question[]): void {
    this.#questions.setAll(questions);
  }

  public hasQuestion(question: Question): boolean {
    return this.#questions.contains(question);
  }

  public addQuestion(question: Question): void {
    this.#questions.add(question);
  }

  public deleteQuestion(target: Question): void {
    this.#questions.remove(target);
  }

  public setQuestion(target: Question, editedQuestion: Question): void {
    this.#questions.setQuestion(target, editedQuestion);
  }

  public getFilteredQuestionList(): readonly Question[] {
    return Object.freeze(
      this.#questions.asReadonlyList().filter((q) => this.#predicate(q))
    );
  }

  public updateFilteredQuestionList(predicate: QuestionPredicate): void {
    this.#predicate = predicate;
  }
}
