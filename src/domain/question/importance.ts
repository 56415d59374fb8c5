import { ValidationError } from "../errors.js";
import { MAX_IMPORTANCE, MIN_IMPORTANCE } from "../policy.js";

/**
 * How much the user cares about a question, from 1 (least) to
 * {@link MAX_IMPORTANCE}.
 */
export class Importance {
  public static readonly MESSAGE_CONSTRAINTS = `Importance should be an integer from ${MIN_IMPORTANCE} to ${MAX_IMPORTANCE}`;

  public readonly value: number;

  public constructor(value: number) {
    if (!Importance.isValidImportance(value)) {
      throw new ValidationError(Importance.MESSAGE_CONSTRAINTS);
    }
    this.value = value;
  }

  public static isValidImportance(value: number): boolean {
    return (
      Number.isInteger(value) &&
      value >= MIN_IMPORTANCE &&
      value <= MAX_IMPORTANCE
    );
  }

  /** Parses a run of digits, e.g. the argument of `i/3`. */
  public static fromString(text: string): Importance {
    const trimmed: string = text.trim();
    if (!/^\d+$/.test(trimmed)) {
      throw new ValidationError(Importance.MESSAGE_CONSTRAINTS);
    }
    return new Importance(Number(trimmed));
  }

  public equals(other: unknown): boolean {
    return (
      other === this ||
      (other instanceof Importance && other.value === this.value)
    );
  }

  public toString(): string {
    return String(this.value);
  }
}
