import { ValidationError } from "./errors.js";

/**
 * One answer option of a question. Immutable once constructed.
 */
export class Choice {
  public static readonly MESSAGE_CONSTRAINTS =
    "Choices can take any values, and it should not be blank";

  /*
   * The first character must not be whitespace, otherwise " " (a blank
   * string) becomes a valid title.
   */
  public static readonly VALIDATION_REGEX = /^[^\s].*$/s;
  public static readonly TRUE_CHOICE_TITLE = "True";
  public static readonly FALSE_CHOICE_TITLE = "False";

  private readonly title: string;
  private readonly isCorrect: boolean;

  public constructor(title: string, isCorrect: boolean) {
    if (!Choice.isValidChoiceTitle(title)) {
      throw new ValidationError(Choice.MESSAGE_CONSTRAINTS);
    }
    this.title = title;
    this.isCorrect = isCorrect;
  }

  public static isValidChoiceTitle(test: string): boolean {
    return Choice.VALIDATION_REGEX.test(test);
  }

  /** Case-sensitive title comparison, ignoring correctness. */
  public hasSameTitle(other: Choice): boolean {
    return other === this || this.title === other.title;
  }

  public getTitle(): string {
    return this.title;
  }

  public getIsCorrect(): boolean {
    return this.isCorrect;
  }

  public equals(other: unknown): boolean {
    if (other === this) return true;
    if (!(other instanceof Choice)) return false;
    return (
      other.title === this.title && other.isCorrect === this.isCorrect
    );
  }

  public toString(): string {
    return this.title + (this.isCorrect ? " (answer)" : "");
  }
}
