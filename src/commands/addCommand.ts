import { format } from "node:util";
import { DuplicateQuestionError } from "../domain/errors.js";
import type { Question } from "../domain/question/question.js";
import type { Model } from "../model/model.js";
import {
  PREFIX_ANSWER,
  PREFIX_CHOICE,
  PREFIX_IMPORTANCE,
  PREFIX_NAME,
  PREFIX_TAG,
  QUESTION_KIND_MCQ,
  QUESTION_KIND_TF,
} from "../parser/cliSyntax.js";
import { BaseCommand } from "./baseCommand.js";
import { CommandResult } from "./commandResult.js";

export class AddCommand extends BaseCommand {
  public static readonly COMMAND_WORD = "add";
  public static readonly MESSAGE_USAGE =
    `${AddCommand.COMMAND_WORD}: Adds a question to the question bank.\n` +
    `Parameters: ${QUESTION_KIND_MCQ} ${PREFIX_NAME}NAME ${PREFIX_IMPORTANCE}IMPORTANCE ` +
    `${PREFIX_CHOICE}WRONG_CHOICE... ${PREFIX_ANSWER}ANSWER [${PREFIX_TAG}TAG]...\n` +
    `        or ${QUESTION_KIND_TF} ${PREFIX_NAME}NAME ${PREFIX_IMPORTANCE}IMPORTANCE ` +
    `${PREFIX_ANSWER}true|false [${PREFIX_TAG}TAG]...\n` +
    `Example: ${AddCommand.COMMAND_WORD} ${QUESTION_KIND_MCQ} ${PREFIX_NAME}What is 1 + 1? ` +
    `${PREFIX_IMPORTANCE}2 ${PREFIX_CHOICE}1 ${PREFIX_CHOICE}3 ${PREFIX_ANSWER}2 ${PREFIX_TAG}math`;

  public static readonly MESSAGE_SUCCESS = "New question added: %s";

  public readonly toAdd: Question;

  public constructor(question: Question) {
    super();
    this.toAdd = question;
  }

  protected validate(model: Model): void {
    if (model.hasQuestion(this.toAdd)) {
      throw new DuplicateQuestionError();
    }
  }

  protected process(model: Model): CommandResult {
    model.addQuestion(this.toAdd);
    return new CommandResult(
      format(AddCommand.MESSAGE_SUCCESS, this.toAdd.toString())
    );
  }

  public getCommandId(): string {
    return AddCommand.COMMAND_WORD;
  }
}
