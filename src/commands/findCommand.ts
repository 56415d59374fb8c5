import { format } from "node:util";
import type { QuestionFilter } from "../domain/question/predicates.js";
import type { Model } from "../model/model.js";
import { PREFIX_TAG } from "../parser/cliSyntax.js";
import { BaseCommand } from "./baseCommand.js";
import { CommandResult } from "./commandResult.js";

/**
 * Narrows the displayed list to the questions matching a filter. Matching is
 * case-insensitive.
 */
export class FindCommand extends BaseCommand {
  public static readonly COMMAND_WORD = "find";
  public static readonly MESSAGE_USAGE =
    `${FindCommand.COMMAND_WORD}: Finds all questions whose names contain any of ` +
    "the specified keywords (case-insensitive), or that carry any of the specified tags, " +
    "and displays them as a list with index numbers.\n" +
    `Parameters: KEYWORD [MORE_KEYWORDS]... or ${PREFIX_TAG}TAG [${PREFIX_TAG}TAG]...\n` +
    `Example: ${FindCommand.COMMAND_WORD} capital france`;

  public static readonly MESSAGE_QUESTIONS_LISTED_OVERVIEW = "%d questions listed!";

  public readonly filter: QuestionFilter;

  public constructor(filter: QuestionFilter) {
    super();
    this.filter = filter;
  }

  protected validate(): void {}

  protected process(model: Model): CommandResult {
    model.updateFilteredQuestionList((q) => this.filter.test(q));
    return new CommandResult(
      format(
        FindCommand.MESSAGE_QUESTIONS_LISTED_OVERVIEW,
        model.getFilteredQuestionList().length
      )
    );
  }

  public override mutatesModel(): boolean {
    return false;
  }

  public getCommandId(): string {
    return FindCommand.COMMAND_WORD;
  }
}
