import type { Command } from "../commands/baseCommand.js";
import { EditCommand } from "../commands/editCommand.js";
import { EditQuestionDescriptor } from "../commands/editQuestionDescriptor.js";
import type { Index } from "../domain/displayIndex.js";
import { ParseError } from "../domain/errors.js";
import { tokenize, type ArgumentMultimap } from "./argumentTokenizer.js";
import { PREFIX_IMPORTANCE, PREFIX_NAME, PREFIX_TAG } from "./cliSyntax.js";
import type { CommandParser } from "./commandParser.js";
import {
  invalidFormat,
  parseImportance,
  parseIndex,
  parseName,
  parseTags,
} from "./parserUtil.js";

export class EditCommandParser implements CommandParser {
  public getCommandId(): string {
    return EditCommand.COMMAND_WORD;
  }

  public getUsage(): string {
    return EditCommand.MESSAGE_USAGE;
  }

  public parse(args: string): Command {
    const argMultimap: ArgumentMultimap = tokenize(
      args,
      PREFIX_NAME,
      PREFIX_IMPORTANCE,
      PREFIX_TAG
    );

    let index: Index;
    try {
      index = parseIndex(argMultimap.getPreamble());
    } catch (error) {
      if (error instanceof ParseError) {
        throw invalidFormat(EditCommand.MESSAGE_USAGE);
      }
      throw error;
    }

    let descriptor: EditQuestionDescriptor = EditQuestionDescriptor.empty();
    const name: string | undefined = argMultimap.getValue(PREFIX_NAME);
    if (name !== undefined) {
      descriptor = descriptor.withName(parseName(name));
    }
    const importance: string | undefined =
      argMultimap.getValue(PREFIX_IMPORTANCE);
    if (importance !== undefined) {
      descriptor = descriptor.withImportance(parseImportance(importance));
    }
    descriptor = this.#parseTagsForEdit(
      argMultimap.getAllValues(PREFIX_TAG),
      descriptor
    );

    if (!descriptor.isAnyFieldEdited()) {
      throw new ParseError(EditCommand.MESSAGE_NOT_EDITED);
    }
    return new EditCommand(index, descriptor);
  }

  /** A single empty `t/` clears the tags; no `t/` at all leaves them alone. */
  #parseTagsForEdit(
    values: readonly string[],
    descriptor: EditQuestionDescriptor
  ): EditQuestionDescriptor {
    if (values.length === 0) return descriptor;
    if (values.length === 1 && values[0] === "") return descriptor.withTags([]);
    return descriptor.withTags(parseTags(values));
  }
}
