import type { Model } from "../model/model.js";
import { APP_NAME } from "../domain/policy.js";
import { BaseCommand } from "./baseCommand.js";
import { CommandResult } from "./commandResult.js";

export class ClearCommand extends BaseCommand {
  public static readonly COMMAND_WORD = "clear";
  public static readonly MESSAGE_USAGE = `${ClearCommand.COMMAND_WORD}: Deletes every question in the question bank.`;
  public static readonly MESSAGE_SUCCESS = `${APP_NAME} has been cleared!`;

  protected validate(): void {}

  protected process(model: Model): CommandResult {
    model.setQuestions([]);
    return new CommandResult(ClearCommand.MESSAGE_SUCCESS);
  }

  public getCommandId(): string {
    return ClearCommand.COMMAND_WORD;
  }
}
