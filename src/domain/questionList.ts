import {
  DuplicateQuestionError,
  QuestionNotFoundError,
} from "./errors.js";
import type { Question } from "./question/question.js";

/**
 * Ordered list of questions in which no two elements are the same question
 * (see {@link Question.isSameQuestion}). Every mutation re-checks that.
 */
export class UniqueQuestionList implements Iterable<Question> {
  #questions: Question[] = [];

  public contains(toCheck: Question): boolean {
    return this.#questions.some((q) => q.isSameQuestion(toCheck));
  }

  public add(toAdd: Question): void {
    if (this.contains(toAdd)) {
      throw new DuplicateQuestionError();
    }
    this.#questions.push(toAdd);
  }

  /**
   * Replaces `target` with `edited`, keeping its position. `edited` may share
   * its business key with `target` but with no other element.
   */
  public setQuestion(target: Question, edited: Question): void {
    const index: number = this.#indexOf(target);
    if (index === -1) {
      throw new QuestionNotFoundError();
    }
    const clash: boolean = this.#questions.some(
      (q, i) => i !== index && q.isSameQuestion(edited)
    );
    if (clash) {
      throw new DuplicateQuestionError();
    }
    this.#questions[index] = edited;
  }

  public remove(toRemove: Question): void {
    const index: number = this.#indexOf(toRemove);
    if (index === -1) {
      throw new QuestionNotFoundError();
    }
    this.#questions.splice(index, 1);
  }

  /** Replaces the whole contents, or nothing if `replacement` has duplicates. */
  public setAll(replacement: readonly Question[]): void {
    if (!UniqueQuestionList.questionsAreUnique(replacement)) {
      throw new DuplicateQuestionError();
    }
    this.#questions = [...replacement];
  }

  public size(): number {
    return this.#questions.length;
  }

  public asReadonlyList(): readonly Question[] {
    return Object.freeze([...this.#questions]);
  }

  public [Symbol.iterator](): Iterator<Question> {
    return this.asReadonlyList()[Symbol.iterator]();
  }

  public static questionsAreUnique(questions: readonly Question[]): boolean {
    return questions.every(
      (q, i) => questions.findIndex((o) => o.isSameQuestion(q)) === i
    );
  }

  // Identity first so an exact instance from the filtered view always wins.
  #indexOf(target: Question): number {
    const byReference: number = this.#questions.indexOf(target);
    return byReference !== -1
      ? byReference
      : this.#questions.findIndex((q) => q.isSameQuestion(target));
  }
}
