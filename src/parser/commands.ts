import { ClearCommand } from "../commands/clearCommand.js";
import { ExitCommand } from "../commands/exitCommand.js";
import { HelpCommand } from "../commands/helpCommand.js";
import { ListCommand } from "../commands/listCommand.js";
import { AddCommandParser } from "./addCommandParser.js";
import { CommandFactory } from "./commandFactory.js";
import { DeleteCommandParser } from "./deleteCommandParser.js";
import { EditCommandParser } from "./editCommandParser.js";
import { FindCommandParser } from "./findCommandParser.js";
import { NoArgumentCommandParser } from "./noArgumentCommandParser.js";

export function createCommandFactory(): CommandFactory {
  const commandFactory = new CommandFactory();
  commandFactory.registerParser(new AddCommandParser());
  commandFactory.registerParser(new EditCommandParser());
  commandFactory.registerParser(new DeleteCommandParser());
  commandFactory.registerParser(
    new NoArgumentCommandParser(
      ListCommand.COMMAND_WORD,
      ListCommand.MESSAGE_USAGE,
      () => new ListCommand()
    )
  );
  commandFactory.registerParser(new FindCommandParser());
  commandFactory.registerParser(
    new NoArgumentCommandParser(
      ClearCommand.COMMAND_WORD,
      ClearCommand.MESSAGE_USAGE,
      () => new ClearCommand()
    )
  );
  commandFactory.registerParser(
    new NoArgumentCommandParser(
      HelpCommand.COMMAND_WORD,
      HelpCommand.MESSAGE_USAGE,
      () => new HelpCommand()
    )
  );
  commandFactory.registerParser(
    new NoArgumentCommandParser(
      ExitCommand.COMMAND_WORD,
      ExitCommand.MESSAGE_USAGE,
      () => new ExitCommand()
    )
  );
  return commandFactory;
}
