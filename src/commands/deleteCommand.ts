import { format } from "node:util";
import type { Index } from "../domain/displayIndex.js";
import type { Question } from "../domain/question/question.js";
import type { Model } from "../model/model.js";
import { CommandResult } from "./commandResult.js";
import { IndexedCommand } from "./indexedCommand.js";

export class DeleteCommand extends IndexedCommand<Question> {
  public static readonly COMMAND_WORD = "delete";
  public static readonly MESSAGE_USAGE =
    `${DeleteCommand.COMMAND_WORD}: Deletes the question identified by the index number used in the displayed question list.\n` +
    "Parameters: INDEX (must be a positive integer)\n" +
    `Example: ${DeleteCommand.COMMAND_WORD} 1`;

  public static readonly MESSAGE_DELETE_QUESTION_SUCCESS = "Deleted Question: %s";

  public constructor(index: Index) {
    super(index);
  }

  protected validate(model: Model): Question {
    return this.resolveTarget(model);
  }

  // The active filter is left as it is.
  protected process(model: Model, target: Question): CommandResult {
    model.deleteQuestion(target);
    return new CommandResult(
      format(DeleteCommand.MESSAGE_DELETE_QUESTION_SUCCESS, target.toString())
    );
  }

  public getCommandId(): string {
    return DeleteCommand.COMMAND_WORD;
  }
}
