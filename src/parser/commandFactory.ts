import type { Command } from "../commands/baseCommand.js";
import { HelpCommand } from "../commands/helpCommand.js";
import { ParseError } from "../domain/errors.js";
import type { CommandParser } from "./commandParser.js";
import { MESSAGE_UNKNOWN_COMMAND } from "./messages.js";
import { invalidFormat } from "./parserUtil.js";

export class CommandFactory {
  static readonly #BASIC_COMMAND_FORMAT = /^(?<commandWord>\S+)(?<args>.*)$/s;

  #parsers: Map<string, CommandParser> = new Map();

  registerParser(parser: CommandParser): void {
    this.#parsers.set(parser.getCommandId(), parser);
  }

  /**
   * Parses one line of user input. Command words are case-sensitive.
   */
  createCommand(userInput: string): Command {
    const match: RegExpExecArray | null =
      CommandFactory.#BASIC_COMMAND_FORMAT.exec(userInput.trim());
    if (!match?.groups) {
      throw invalidFormat(HelpCommand.MESSAGE_USAGE);
    }
    const { commandWord, args } = match.groups;
    const parser: CommandParser | undefined = this.#parsers.get(commandWord);
    if (!parser) {
      throw new ParseError(MESSAGE_UNKNOWN_COMMAND);
    }
    return parser.parse(args);
  }

  getUsages(): string[] {
    return [...this.#parsers.values()].map((p) => p.getUsage());
  }
}
