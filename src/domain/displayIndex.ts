import { ValidationError } from "./errors.js";

/**
 * A position in the displayed question list. Users see 1-based numbers,
 * list access needs 0-based ones; this keeps the two from being mixed up.
 */
export class Index {
  public static readonly MESSAGE_INVALID_INDEX =
    "Index is not a non-zero unsigned integer.";

  private readonly zeroBased: number;

  private constructor(zeroBased: number) {
    if (!Number.isSafeInteger(zeroBased) || zeroBased < 0) {
      throw new ValidationError(Index.MESSAGE_INVALID_INDEX);
    }
    this.zeroBased = zeroBased;
  }

  public static fromZeroBased(zeroBased: number): Index {
    return new Index(zeroBased);
  }

  public static fromOneBased(oneBased: number): Index {
    return new Index(oneBased - 1);
  }

  public getZeroBased(): number {
    return this.zeroBased;
  }

  public getOneBased(): number {
    return this.zeroBased + 1;
  }

  public equals(other: unknown): boolean {
    return (
      other === this ||
      (other instanceof Index && other.zeroBased === this.zeroBased)
    );
  }
}
