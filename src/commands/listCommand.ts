import { PREDICATE_SHOW_ALL_QUESTIONS, type Model } from "../model/model.js";
import { BaseCommand } from "./baseCommand.js";
import { CommandResult } from "./commandResult.js";

export class ListCommand extends BaseCommand {
  public static readonly COMMAND_WORD = "list";
  public static readonly MESSAGE_USAGE = `${ListCommand.COMMAND_WORD}: Shows every question in the question bank.`;
  public static readonly MESSAGE_SUCCESS = "Listed all questions";

  protected validate(): void {}

  protected process(model: Model): CommandResult {
    model.updateFilteredQuestionList(PREDICATE_SHOW_ALL_QUESTIONS);
    return new CommandResult(ListCommand.MESSAGE_SUCCESS);
  }

  public override mutatesModel(): boolean {
    return false;
  }

  public getCommandId(): string {
    return ListCommand.COMMAND_WORD;
  }
}
