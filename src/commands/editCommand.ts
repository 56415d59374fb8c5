import { format } from "node:util";
import type { Index } from "../domain/displayIndex.js";
import {
  DuplicateQuestionError,
  ValidationError,
} from "../domain/errors.js";
import type { Question } from "../domain/question/question.js";
import { PREDICATE_SHOW_ALL_QUESTIONS, type Model } from "../model/model.js";
import {
  PREFIX_IMPORTANCE,
  PREFIX_NAME,
  PREFIX_TAG,
} from "../parser/cliSyntax.js";
import { CommandResult } from "./commandResult.js";
import type { EditQuestionDescriptor } from "./editQuestionDescriptor.js";
import { IndexedCommand } from "./indexedCommand.js";

interface EditPlan {
  readonly original: Question;
  readonly edited: Question;
}

/**
 * Edits the details of the question at a position of the displayed list.
 */
export class EditCommand extends IndexedCommand<EditPlan> {
  public static readonly COMMAND_WORD = "edit";
  public static readonly MESSAGE_USAGE =
    `${EditCommand.COMMAND_WORD}: Edits the details of the question identified ` +
    "by the index number used in the displayed question list. " +
    "Existing values will be overwritten by the input values.\n" +
    "Parameters: INDEX (must be a positive integer) " +
    `[${PREFIX_NAME}NAME] [${PREFIX_IMPORTANCE}IMPORTANCE] [${PREFIX_TAG}TAG]...\n` +
    `Example: ${EditCommand.COMMAND_WORD} 1 ${PREFIX_IMPORTANCE}3`;

  public static readonly MESSAGE_EDIT_QUESTION_SUCCESS = "Edited Question: %s";
  public static readonly MESSAGE_NOT_EDITED =
    "At least one field to edit must be provided.";

  public readonly descriptor: EditQuestionDescriptor;

  public constructor(index: Index, descriptor: EditQuestionDescriptor) {
    super(index);
    if (!descriptor.isAnyFieldEdited()) {
      throw new ValidationError(EditCommand.MESSAGE_NOT_EDITED);
    }
    this.descriptor = descriptor;
  }

  protected validate(model: Model): EditPlan {
    const original: Question = this.resolveTarget(model);
    const edited: Question = this.descriptor.applyTo(original);

    // Renaming onto another question's name is a clash; keeping the name is not.
    if (!original.isSameQuestion(edited) && model.hasQuestion(edited)) {
      throw new DuplicateQuestionError();
    }
    return { original, edited };
  }

  protected process(model: Model, { original, edited }: EditPlan): CommandResult {
    model.setQuestion(original, edited);
    model.updateFilteredQuestionList(PREDICATE_SHOW_ALL_QUESTIONS);
    return new CommandResult(
      format(EditCommand.MESSAGE_EDIT_QUESTION_SUCCESS, edited.toString())
    );
  }

  public getCommandId(): string {
    return EditCommand.COMMAND_WORD;
  }
}
