import type { Command } from "../commands/baseCommand.js";
import { DeleteCommand } from "../commands/deleteCommand.js";
import { ParseError } from "../domain/errors.js";
import type { CommandParser } from "./commandParser.js";
import { invalidFormat, parseIndex } from "./parserUtil.js";

export class DeleteCommandParser implements CommandParser {
  public getCommandId(): string {
    return DeleteCommand.COMMAND_WORD;
  }

  public getUsage(): string {
    return DeleteCommand.MESSAGE_USAGE;
  }

  public parse(args: string): Command {
    try {
      return new DeleteCommand(parseIndex(args));
    } catch (error) {
      if (error instanceof ParseError) {
        throw invalidFormat(DeleteCommand.MESSAGE_USAGE);
      }
      throw error;
    }
  }
}
