import { APP_NAME } from "./policy.js";

export const MESSAGE_DUPLICATE_QUESTION = `This question already exists in ${APP_NAME}.`;
export const MESSAGE_INVALID_QUESTION_DISPLAYED_INDEX =
  "The question index provided is invalid";
export const MESSAGE_QUESTION_NOT_FOUND =
  "The question could not be found in the question bank";

/**
 * Base class of every failure that carries a message meant for the user.
 * The shell prints `message` and keeps running.
 */
export abstract class AppError extends Error {
  protected constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A value object was given input that breaks its constraints. */
export class ValidationError extends AppError {
  public constructor(message: string) {
    super(message);
  }
}

export class DuplicateQuestionError extends AppError {
  public constructor(message: string = MESSAGE_DUPLICATE_QUESTION) {
    super(message);
  }
}

export class QuestionNotFoundError extends AppError {
  public constructor(message: string = MESSAGE_QUESTION_NOT_FOUND) {
    super(message);
  }
}

export class IndexOutOfRangeError extends AppError {
  public constructor(
    message: string = MESSAGE_INVALID_QUESTION_DISPLAYED_INDEX
  ) {
    super(message);
  }
}

/** Raised by the command parser when text cannot become a command. */
export class ParseError extends AppError {
  public constructor(message: string) {
    super(message);
  }
}

export class StorageError extends AppError {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/** Stored or seeded data could not be turned back into questions. */
export class DataLoadingError extends AppError {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
