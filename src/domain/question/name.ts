import { ValidationError } from "../errors.js";

export class Name {
  public static readonly MESSAGE_CONSTRAINTS =
    "Names can take any values, and it should not be blank";
  public static readonly VALIDATION_REGEX = /^[^\s].*$/s;

  public readonly fullName: string;

  public constructor(name: string) {
    if (!Name.isValidName(name)) {
      throw new ValidationError(Name.MESSAGE_CONSTRAINTS);
    }
    this.fullName = name;
  }

  public static isValidName(test: string): boolean {
    return Name.VALIDATION_REGEX.test(test);
  }

  public equals(other: unknown): boolean {
    return (
      other === this ||
      (other instanceof Name && other.fullName === this.fullName)
    );
  }

  public toString(): string {
    return this.fullName;
  }
}
