import { APP_NAME } from "../domain/policy.js";
import { BaseCommand } from "./baseCommand.js";
import { CommandResult } from "./commandResult.js";

export class ExitCommand extends BaseCommand {
  public static readonly COMMAND_WORD = "exit";
  public static readonly MESSAGE_USAGE = `${ExitCommand.COMMAND_WORD}: Saves and closes ${APP_NAME}.`;
  public static readonly MESSAGE_EXIT_ACKNOWLEDGEMENT = `Exiting ${APP_NAME} as requested ...`;

  protected validate(): void {}

  protected process(): CommandResult {
    return new CommandResult(ExitCommand.MESSAGE_EXIT_ACKNOWLEDGEMENT, {
      exit: true,
    });
  }

  public override mutatesModel(): boolean {
    return false;
  }

  public getCommandId(): string {
    return ExitCommand.COMMAND_WORD;
  }
}
