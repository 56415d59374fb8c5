import { describe, expect, it } from "vitest";
import {
  CAPITAL,
  EARTH_ROUND,
  PRIME,
  SORTING,
} from "../../testutil/typicalQuestions.js";
import { QuestionBuilder } from "../../testutil/questionBuilder.js";
import { Choice } from "../choice.js";
import { ValidationError } from "../errors.js";
import { Importance } from "./importance.js";
import { MultipleChoiceQuestion } from "./multipleChoiceQuestion.js";
import { Name } from "./name.js";
import { Tag } from "./tag.js";
import { TrueFalseQuestion } from "./trueFalseQuestion.js";

const name = new Name("Pick one");
const importance = new Importance(3);

describe("question fields", () => {
  it("validates names", () => {
    expect(() => new Name("")).toThrow(Name.MESSAGE_CONSTRAINTS);
    expect(() => new Name(" leading space")).toThrow(ValidationError);
    expect(new Name("2 + 2 = ?").fullName).toBe("2 + 2 = ?");
  });

  it("accepts importance from 1 to 5 only", () => {
    expect(() => new Importance(0)).toThrow(Importance.MESSAGE_CONSTRAINTS);
    expect(() => new Importance(6)).toThrow(ValidationError);
    expect(() => new Importance(2.5)).toThrow(ValidationError);
    expect(new Importance(1).value).toBe(1);
    expect(new Importance(5).value).toBe(5);
  });

  it("parses importance from digits", () => {
    expect(Importance.fromString(" 4 ").value).toBe(4);
    expect(() => Importance.fromString("3a")).toThrow(ValidationError);
    expect(() => Importance.fromString("-1")).toThrow(ValidationError);
    expect(() => Importance.fromString("")).toThrow(ValidationError);
  });

  it("accepts alphanumeric tags only", () => {
    expect(new Tag("cs2103").toString()).toBe("[cs2103]");
    expect(() => new Tag("two words")).toThrow(Tag.MESSAGE_CONSTRAINTS);
    expect(() => new Tag("")).toThrow(ValidationError);
    expect(() => new Tag("c++")).toThrow(ValidationError);
  });
});

describe("MultipleChoiceQuestion", () => {
  it("renders name, importance, choices and tags", () => {
    expect(CAPITAL.toString()).toBe(
      "What is the capital of France?; Importance: 2; Choices: London, Berlin, Paris (answer); Tags: [geography]"
    );
    expect(SORTING.toString()).toBe(
      "Which sort is stable?; Importance: 1; Choices: Quick sort, Heap sort, Merge sort (answer); Tags: [algorithms][sorting]"
    );
  });

  it("exposes its single answer", () => {
    expect(PRIME.getAnswer().getTitle()).toBe("7");
    expect(PRIME.kind).toBe("mcq");
  });

  it("needs at least two choices", () => {
    expect(
      () => new MultipleChoiceQuestion(name, importance, [], [new Choice("a", true)])
    ).toThrow(MultipleChoiceQuestion.MESSAGE_CONSTRAINTS);
  });

  it("needs exactly one answer", () => {
    const twoAnswers = [new Choice("a", true), new Choice("b", true)];
    const noAnswer = [new Choice("a", false), new Choice("b", false)];

    expect(() => new MultipleChoiceQuestion(name, importance, [], twoAnswers)).toThrow(
      ValidationError
    );
    expect(() => new MultipleChoiceQuestion(name, importance, [], noAnswer)).toThrow(
      ValidationError
    );
  });

  it("rejects choices sharing a title", () => {
    const choices = [
      new Choice("a", false),
      new Choice("b", false),
      new Choice("a", true),
    ];
    expect(() => new MultipleChoiceQuestion(name, importance, [], choices)).toThrow(
      ValidationError
    );
  });

  it("drops repeated tags", () => {
    const question = new MultipleChoiceQuestion(
      name,
      importance,
      [new Tag("a"), new Tag("b"), new Tag("a")],
      [new Choice("x", false), new Choice("y", true)]
    );
    expect(question.getTags().map((t) => t.tagName)).toEqual(["a", "b"]);
  });

  it("is the same question as anything with its name", () => {
    const sameName = new QuestionBuilder()
      .withImportance(5)
      .withTags()
      .withChoices("Rome", "Madrid")
      .buildMcq();
    const sameNameTf = new QuestionBuilder().buildTf(false);

    expect(CAPITAL.isSameQuestion(sameName)).toBe(true);
    expect(CAPITAL.isSameQuestion(sameNameTf)).toBe(true);
    expect(CAPITAL.isSameQuestion(PRIME)).toBe(false);
  });

  it("compares every field for equality, ignoring tag and choice order", () => {
    const reordered = new MultipleChoiceQuestion(
      SORTING.getName(),
      SORTING.getImportance(),
      [new Tag("sorting"), new Tag("algorithms")],
      [...SORTING.getChoices()].reverse()
    );
    const moreImportant = SORTING.withDetails({
      name: SORTING.getName(),
      importance: new Importance(2),
      tags: SORTING.getTags(),
    });

    expect(SORTING.equals(reordered)).toBe(true);
    expect(SORTING.equals(moreImportant)).toBe(false);
    expect(CAPITAL.equals(new QuestionBuilder().buildTf(true))).toBe(false);
  });

  it("keeps its choices when the details change", () => {
    const edited = CAPITAL.withDetails({
      name: new Name("Capital of France?"),
      importance: new Importance(4),
      tags: [],
    });

    expect(edited).toBeInstanceOf(MultipleChoiceQuestion);
    expect(edited.getChoices()).toHaveLength(3);
    edited.getChoices().forEach((c, i) => expect(c).toBe(CAPITAL.getChoices()[i]));
    expect(edited.toString()).toBe(
      "Capital of France?; Importance: 4; Choices: London, Berlin, Paris (answer)"
    );
  });
});

describe("TrueFalseQuestion", () => {
  it("builds True and False choices from the answer", () => {
    const question = TrueFalseQuestion.fromAnswer(name, importance, [], false);

    expect(question.kind).toBe("tf");
    expect(question.getChoices().map(String)).toEqual(["True", "False (answer)"]);
    expect(question.getAnswer().getTitle()).toBe("False");
  });

  it("renders without a tags segment when untagged", () => {
    expect(EARTH_ROUND.toString()).toBe(
      "The earth is round; Importance: 5; Choices: True (answer), False"
    );
  });

  it("accepts only True and False with one answer", () => {
    const twoTrues = [new Choice("True", true), new Choice("True", false)];
    const three = [
      new Choice("True", true),
      new Choice("False", false),
      new Choice("Maybe", false),
    ];
    const bothCorrect = [new Choice("True", true), new Choice("False", true)];

    for (const choices of [twoTrues, three, bothCorrect]) {
      expect(() => new TrueFalseQuestion(name, importance, [], choices)).toThrow(
        TrueFalseQuestion.MESSAGE_CONSTRAINTS
      );
    }
  });

  it("is not equal to a multiple choice question with the same fields", () => {
    const lookalike = new MultipleChoiceQuestion(
      EARTH_ROUND.getName(),
      EARTH_ROUND.getImportance(),
      EARTH_ROUND.getTags(),
      EARTH_ROUND.getChoices()
    );

    expect(lookalike.toString()).toBe(EARTH_ROUND.toString());
    expect(lookalike.equals(EARTH_ROUND)).toBe(false);
    expect(EARTH_ROUND.equals(lookalike)).toBe(false);
    expect(lookalike.isSameQuestion(EARTH_ROUND)).toBe(true);
  });

  it("stays a true/false question when the details change", () => {
    const edited = EARTH_ROUND.withDetails({
      name: EARTH_ROUND.getName(),
      importance: new Importance(1),
      tags: [new Tag("science")],
    });

    expect(edited).toBeInstanceOf(TrueFalseQuestion);
    expect(edited.toString()).toBe(
      "The earth is round; Importance: 1; Choices: True (answer), False; Tags: [science]"
    );
  });
});
