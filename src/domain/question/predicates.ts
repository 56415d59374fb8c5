import type { QuestionCapabilities } from "./question.js";

/** A reusable filter that can also be compared, so parsed commands can be. */
export interface QuestionFilter {
  test(question: QuestionCapabilities): boolean;
  equals(other: unknown): boolean;
}

function normalise(keywords: readonly string[]): readonly string[] {
  return Object.freeze(keywords.map((k) => k.toLowerCase()));
}

/**
 * Matches a question whose name contains any of the keywords as a whole
 * word, ignoring case.
 */
export class NameContainsKeywordsPredicate implements QuestionFilter {
  public readonly keywords: readonly string[];

  public constructor(keywords: readonly string[]) {
    this.keywords = normalise(keywords);
  }

  public test(question: QuestionCapabilities): boolean {
    const words: string[] = question
      .getName()
      .fullName.toLowerCase()
      .split(/\s+/)
      .filter((w) => w.length > 0);
    return this.keywords.some((k) => words.includes(k));
  }

  public equals(other: unknown): boolean {
    return (
      other === this ||
      (other instanceof NameContainsKeywordsPredicate &&
        other.keywords.join("\u0000") === this.keywords.join("\u0000"))
    );
  }
}

/** Matches a question carrying any of the given tags, ignoring case. */
export class TagsContainKeywordsPredicate implements QuestionFilter {
  public readonly keywords: readonly string[];

  public constructor(keywords: readonly string[]) {
    this.keywords = normalise(keywords);
  }

  public test(question: QuestionCapabilities): boolean {
    return question
      .getTags()
      .some((t) => this.keywords.includes(t.tagName.toLowerCase()));
  }

  public equals(other: unknown): boolean {
    return (
      other === this ||
      (other instanceof TagsContainKeywordsPredicate &&
        other.keywords.join("\u0000") === this.keywords.join("\u0000"))
    );
  }
}
