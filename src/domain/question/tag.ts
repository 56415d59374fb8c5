import { ValidationError } from "../errors.js";

export class Tag {
  public static readonly MESSAGE_CONSTRAINTS =
    "Tags names should be alphanumeric";
  public static readonly VALIDATION_REGEX = /^[\p{L}\p{N}]+$/u;

  public readonly tagName: string;

  public constructor(tagName: string) {
    if (!Tag.isValidTagName(tagName)) {
      throw new ValidationError(Tag.MESSAGE_CONSTRAINTS);
    }
    this.tagName = tagName;
  }

  public static isValidTagName(test: string): boolean {
    return Tag.VALIDATION_REGEX.test(test);
  }

  public equals(other: unknown): boolean {
    return (
      other === this || (other instanceof Tag && other.tagName === this.tagName)
    );
  }

  public toString(): string {
    return `[${this.tagName}]`;
  }
}
