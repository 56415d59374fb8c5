import { describe, expect, it } from "vitest";
import { Index } from "../domain/displayIndex.js";
import { ParseError, ValidationError } from "../domain/errors.js";
import { Tag } from "../domain/question/tag.js";
import { MESSAGE_INVALID_TF_ANSWER } from "./messages.js";
import {
  invalidFormat,
  parseChoice,
  parseImportance,
  parseIndex,
  parseName,
  parseTags,
  parseTrueFalseAnswer,
} from "./parserUtil.js";

describe("parserUtil", () => {
  it("parses positive indices", () => {
    expect(parseIndex(" 1 ").getZeroBased()).toBe(0);
    expect(parseIndex("12").getOneBased()).toBe(12);
  });

  it("rejects anything but a positive integer as an index", () => {
    for (const text of ["0", "-1", "a", "1.0", "+1", "", "01", "1 2"]) {
      expect(() => parseIndex(text)).toThrow(ParseError);
    }
    expect(() => parseIndex("0")).toThrow(Index.MESSAGE_INVALID_INDEX);
    expect(() => parseIndex("99999999999999999999")).toThrow(ParseError);
  });

  it("trims names and tags before validating them", () => {
    expect(parseName("  Capital?  ").fullName).toBe("Capital?");
    expect(parseTags([" a ", "b"])).toEqual([new Tag("a"), new Tag("b")]);
    expect(() => parseTags(["ok", "not ok"])).toThrow(Tag.MESSAGE_CONSTRAINTS);
  });

  it("parses importance", () => {
    expect(parseImportance("5").value).toBe(5);
    expect(() => parseImportance("9")).toThrow(ValidationError);
  });

  it("parses choices with their correctness", () => {
    expect(parseChoice(" Paris ", true).toString()).toBe("Paris (answer)");
  });

  it("reads true/false answers ignoring case", () => {
    expect(parseTrueFalseAnswer("TRUE")).toBe(true);
    expect(parseTrueFalseAnswer(" false")).toBe(false);
    expect(() => parseTrueFalseAnswer("yes")).toThrow(MESSAGE_INVALID_TF_ANSWER);
  });

  it("builds an invalid format error around a usage text", () => {
    const error = invalidFormat("usage: x");

    expect(error).toBeInstanceOf(ParseError);
    expect(error.message).toBe("Invalid command format! \nusage: x");
  });
});
