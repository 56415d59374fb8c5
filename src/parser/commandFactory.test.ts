import { format } from "node:util";
import { describe, expect, it } from "vitest";
import { AddCommand } from "../commands/addCommand.js";
import { ClearCommand } from "../commands/clearCommand.js";
import { DeleteCommand } from "../commands/deleteCommand.js";
import { EditCommand } from "../commands/editCommand.js";
import { EditQuestionDescriptor } from "../commands/editQuestionDescriptor.js";
import { ExitCommand } from "../commands/exitCommand.js";
import { FindCommand } from "../commands/findCommand.js";
import { HelpCommand } from "../commands/helpCommand.js";
import { ListCommand } from "../commands/listCommand.js";
import { Choice } from "../domain/choice.js";
import { Index } from "../domain/displayIndex.js";
import { ParseError, ValidationError } from "../domain/errors.js";
import { Importance } from "../domain/question/importance.js";
import { MultipleChoiceQuestion } from "../domain/question/multipleChoiceQuestion.js";
import { Name } from "../domain/question/name.js";
import {
  NameContainsKeywordsPredicate,
  TagsContainKeywordsPredicate,
} from "../domain/question/predicates.js";
import { Tag } from "../domain/question/tag.js";
import { TrueFalseQuestion } from "../domain/question/trueFalseQuestion.js";
import { createCommandFactory } from "./commands.js";
import { MESSAGE_INVALID_TF_ANSWER, MESSAGE_UNKNOWN_COMMAND } from "./messages.js";

const factory = createCommandFactory();

function invalidFormatMessage(usage: string): string {
  return format("Invalid command format! \n%s", usage);
}

describe("CommandFactory", () => {
  it("rejects blank input with the help usage", () => {
    expect(() => factory.createCommand("   ")).toThrow(
      invalidFormatMessage(HelpCommand.MESSAGE_USAGE)
    );
  });

  it("rejects unknown and differently cased command words", () => {
    expect(() => factory.createCommand("remove 1")).toThrow(MESSAGE_UNKNOWN_COMMAND);
    expect(() => factory.createCommand("LIST")).toThrow(ParseError);
  });

  it("lists one usage per registered command", () => {
    const usages = factory.getUsages();

    expect(usages).toHaveLength(8);
    expect(usages[0]).toBe(AddCommand.MESSAGE_USAGE);
    expect(usages[7]).toBe(ExitCommand.MESSAGE_USAGE);
  });

  it("parses commands without arguments, ignoring trailing text", () => {
    expect(factory.createCommand("list")).toBeInstanceOf(ListCommand);
    expect(factory.createCommand("list 3")).toBeInstanceOf(ListCommand);
    expect(factory.createCommand("clear")).toBeInstanceOf(ClearCommand);
    expect(factory.createCommand("  help ")).toBeInstanceOf(HelpCommand);
    expect(factory.createCommand("exit")).toBeInstanceOf(ExitCommand);
  });

  describe("add", () => {
    it("parses a multiple choice question with the answer last", () => {
      const command = factory.createCommand(
        "add mcq n/What is 1 + 1? i/2 c/1 c/3 a/2 t/math"
      );

      expect(command).toEqual(
        new AddCommand(
          new MultipleChoiceQuestion(
            new Name("What is 1 + 1?"),
            new Importance(2),
            [new Tag("math")],
            [new Choice("1", false), new Choice("3", false), new Choice("2", true)]
          )
        )
      );
    });

    it("parses a true/false question", () => {
      const command = factory.createCommand("add TF n/Sky is blue i/1 a/TRUE");

      expect(command).toEqual(
        new AddCommand(
          TrueFalseQuestion.fromAnswer(new Name("Sky is blue"), new Importance(1), [], true)
        )
      );
    });

    it("rejects an unknown question kind or missing fields", () => {
      const expected = invalidFormatMessage(AddCommand.MESSAGE_USAGE);

      expect(() => factory.createCommand("add quiz n/x i/1 a/y")).toThrow(expected);
      expect(() => factory.createCommand("add mcq n/x i/1 a/2")).toThrow(expected);
      expect(() => factory.createCommand("add mcq n/x c/1 a/2")).toThrow(expected);
      expect(() => factory.createCommand("add tf n/x i/1")).toThrow(expected);
      expect(() => factory.createCommand("add tf n/x i/1 c/maybe a/true")).toThrow(
        expected
      );
    });

    it("rejects invalid field values", () => {
      expect(() => factory.createCommand("add tf n/x i/1 a/maybe")).toThrow(
        MESSAGE_INVALID_TF_ANSWER
      );
      expect(() => factory.createCommand("add mcq n/x i/1 c/2 a/2")).toThrow(
        MultipleChoiceQuestion.MESSAGE_CONSTRAINTS
      );
      expect(() => factory.createCommand("add tf n/x i/7 a/true")).toThrow(
        Importance.MESSAGE_CONSTRAINTS
      );
    });
  });

  describe("edit", () => {
    it("parses the fields to change", () => {
      expect(factory.createCommand("edit 1 i/4")).toEqual(
        new EditCommand(
          Index.fromOneBased(1),
          EditQuestionDescriptor.empty().withImportance(new Importance(4))
        )
      );
      expect(factory.createCommand("edit 3 n/Renamed t/a t/b")).toEqual(
        new EditCommand(
          Index.fromOneBased(3),
          EditQuestionDescriptor.empty()
            .withName(new Name("Renamed"))
            .withTags([new Tag("a"), new Tag("b")])
        )
      );
    });

    it("reads a lone empty tag prefix as clearing the tags", () => {
      expect(factory.createCommand("edit 2 t/")).toEqual(
        new EditCommand(Index.fromOneBased(2), EditQuestionDescriptor.empty().withTags([]))
      );
    });

    it("needs at least one field", () => {
      expect(() => factory.createCommand("edit 1")).toThrow(EditCommand.MESSAGE_NOT_EDITED);
    });

    it("rejects a missing or malformed index", () => {
      const expected = invalidFormatMessage(EditCommand.MESSAGE_USAGE);

      expect(() => factory.createCommand("edit i/4")).toThrow(expected);
      expect(() => factory.createCommand("edit 0 i/4")).toThrow(expected);
      expect(() => factory.createCommand("edit x i/4")).toThrow(expected);
    });

    it("rejects invalid field values", () => {
      expect(() => factory.createCommand("edit 1 i/9")).toThrow(ValidationError);
      expect(() => factory.createCommand("edit 1 n/")).toThrow(Name.MESSAGE_CONSTRAINTS);
      expect(() => factory.createCommand("edit 1 t/a t/")).toThrow(Tag.MESSAGE_CONSTRAINTS);
    });
  });

  describe("delete", () => {
    it("parses the index", () => {
      expect(factory.createCommand("delete 2")).toEqual(
        new DeleteCommand(Index.fromOneBased(2))
      );
    });

    it("rejects anything but one positive index", () => {
      const expected = invalidFormatMessage(DeleteCommand.MESSAGE_USAGE);

      for (const input of ["delete", "delete 0", "delete a", "delete 1 2"]) {
        expect(() => factory.createCommand(input)).toThrow(expected);
      }
    });
  });

  describe("find", () => {
    it("parses name keywords", () => {
      expect(factory.createCommand("find capital   stable")).toEqual(
        new FindCommand(new NameContainsKeywordsPredicate(["capital", "stable"]))
      );
    });

    it("parses tags", () => {
      expect(factory.createCommand("find t/math t/Algorithms")).toEqual(
        new FindCommand(new TagsContainKeywordsPredicate(["math", "algorithms"]))
      );
    });

    it("rejects no keywords, or keywords mixed with tags", () => {
      const expected = invalidFormatMessage(FindCommand.MESSAGE_USAGE);

      expect(() => factory.createCommand("find")).toThrow(expected);
      expect(() => factory.createCommand("find x t/y")).toThrow(expected);
      expect(() => factory.createCommand("find t/")).toThrow(expected);
    });
  });
});
