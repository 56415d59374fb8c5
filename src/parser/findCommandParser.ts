import type { Command } from "../commands/baseCommand.js";
import { FindCommand } from "../commands/findCommand.js";
import {
  NameContainsKeywordsPredicate,
  TagsContainKeywordsPredicate,
} from "../domain/question/predicates.js";
import { tokenize, type ArgumentMultimap } from "./argumentTokenizer.js";
import { PREFIX_TAG } from "./cliSyntax.js";
import type { CommandParser } from "./commandParser.js";
import { invalidFormat } from "./parserUtil.js";

export class FindCommandParser implements CommandParser {
  public getCommandId(): string {
    return FindCommand.COMMAND_WORD;
  }

  public getUsage(): string {
    return FindCommand.MESSAGE_USAGE;
  }

  public parse(args: string): Command {
    const argMultimap: ArgumentMultimap = tokenize(args, PREFIX_TAG);
    const preamble: string = argMultimap.getPreamble();
    const tagKeywords: readonly string[] = argMultimap.getAllValues(PREFIX_TAG);

    if (tagKeywords.length > 0) {
      if (preamble !== "" || tagKeywords.some((k) => k === "")) {
        throw invalidFormat(FindCommand.MESSAGE_USAGE);
      }
      return new FindCommand(new TagsContainKeywordsPredicate(tagKeywords));
    }

    if (preamble === "") {
      throw invalidFormat(FindCommand.MESSAGE_USAGE);
    }
    return new FindCommand(
      new NameContainsKeywordsPredicate(preamble.split(/\s+/))
    );
  }
}
