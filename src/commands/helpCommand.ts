import { BaseCommand } from "./baseCommand.js";
import { CommandResult } from "./commandResult.js";

export class HelpCommand extends BaseCommand {
  public static readonly COMMAND_WORD = "help";
  public static readonly MESSAGE_USAGE = `${HelpCommand.COMMAND_WORD}: Shows usage instructions for every command.\nExample: ${HelpCommand.COMMAND_WORD}`;
  public static readonly SHOWING_HELP_MESSAGE = "Showing help.";

  protected validate(): void {}

  protected process(): CommandResult {
    return new CommandResult(HelpCommand.SHOWING_HELP_MESSAGE, {
      showHelp: true,
    });
  }

  public override mutatesModel(): boolean {
    return false;
  }

  public getCommandId(): string {
    return HelpCommand.COMMAND_WORD;
  }
}
