import { AddCommand } from "../commands/addCommand.js";
import type { Command } from "../commands/baseCommand.js";
import type { Choice } from "../domain/choice.js";
import type { Importance } from "../domain/question/importance.js";
import { MultipleChoiceQuestion } from "../domain/question/multipleChoiceQuestion.js";
import type { Name } from "../domain/question/name.js";
import type { Question } from "../domain/question/question.js";
import type { Tag } from "../domain/question/tag.js";
import { TrueFalseQuestion } from "../domain/question/trueFalseQuestion.js";
import { tokenize, type ArgumentMultimap } from "./argumentTokenizer.js";
import {
  PREFIX_ANSWER,
  PREFIX_CHOICE,
  PREFIX_IMPORTANCE,
  PREFIX_NAME,
  PREFIX_TAG,
  QUESTION_KIND_MCQ,
  QUESTION_KIND_TF,
} from "./cliSyntax.js";
import type { CommandParser } from "./commandParser.js";
import {
  invalidFormat,
  parseChoice,
  parseImportance,
  parseName,
  parseTags,
  parseTrueFalseAnswer,
} from "./parserUtil.js";

interface CommonFields {
  name: Name;
  importance: Importance;
  tags: Tag[];
  answer: string;
}

export class AddCommandParser implements CommandParser {
  public getCommandId(): string {
    return AddCommand.COMMAND_WORD;
  }

  public getUsage(): string {
    return AddCommand.MESSAGE_USAGE;
  }

  public parse(args: string): Command {
    const argMultimap: ArgumentMultimap = tokenize(
      args,
      PREFIX_NAME,
      PREFIX_IMPORTANCE,
      PREFIX_CHOICE,
      PREFIX_ANSWER,
      PREFIX_TAG
    );
    const kind: string = argMultimap.getPreamble().toLowerCase();
    switch (kind) {
      case QUESTION_KIND_MCQ:
        return new AddCommand(this.#parseMultipleChoice(argMultimap));
      case QUESTION_KIND_TF:
        return new AddCommand(this.#parseTrueFalse(argMultimap));
      default:
        throw invalidFormat(AddCommand.MESSAGE_USAGE);
    }
  }

  #parseCommon(argMultimap: ArgumentMultimap): CommonFields {
    const name: string | undefined = argMultimap.getValue(PREFIX_NAME);
    const importance: string | undefined =
      argMultimap.getValue(PREFIX_IMPORTANCE);
    const answer: string | undefined = argMultimap.getValue(PREFIX_ANSWER);
    if (name === undefined || importance === undefined || answer === undefined) {
      throw invalidFormat(AddCommand.MESSAGE_USAGE);
    }
    return {
      name: parseName(name),
      importance: parseImportance(importance),
      tags: parseTags(argMultimap.getAllValues(PREFIX_TAG)),
      answer,
    };
  }

  #parseMultipleChoice(argMultimap: ArgumentMultimap): Question {
    const { name, importance, tags, answer } = this.#parseCommon(argMultimap);
    const wrongChoices: readonly string[] = argMultimap.getAllValues(PREFIX_CHOICE);
    if (wrongChoices.length === 0) {
      throw invalidFormat(AddCommand.MESSAGE_USAGE);
    }
    const choices: Choice[] = [
      ...wrongChoices.map((title) => parseChoice(title, false)),
      parseChoice(answer, true),
    ];
    return new MultipleChoiceQuestion(name, importance, tags, choices);
  }

  #parseTrueFalse(argMultimap: ArgumentMultimap): Question {
    if (argMultimap.hasPrefix(PREFIX_CHOICE)) {
      throw invalidFormat(AddCommand.MESSAGE_USAGE);
    }
    const { name, importance, tags, answer } = this.#parseCommon(argMultimap);
    return TrueFalseQuestion.fromAnswer(
      name,
      importance,
      tags,
      parseTrueFalseAnswer(answer)
    );
  }
}
