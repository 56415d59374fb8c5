import { describe, expect, it } from "vitest";
import {
  CAPITAL,
  EARTH_ROUND,
  PRIME,
  SORTING,
} from "../../testutil/typicalQuestions.js";
import {
  NameContainsKeywordsPredicate,
  TagsContainKeywordsPredicate,
} from "./predicates.js";

describe("NameContainsKeywordsPredicate", () => {
  it("matches whole words of the name, ignoring case", () => {
    const predicate = new NameContainsKeywordsPredicate(["CAPITAL"]);

    expect(predicate.test(CAPITAL)).toBe(true);
    expect(predicate.test(PRIME)).toBe(false);
  });

  it("does not match part of a word", () => {
    expect(new NameContainsKeywordsPredicate(["cap"]).test(CAPITAL)).toBe(false);
  });

  it("matches when any keyword matches", () => {
    const predicate = new NameContainsKeywordsPredicate(["zebra", "earth"]);

    expect(predicate.test(EARTH_ROUND)).toBe(true);
    expect(predicate.test(SORTING)).toBe(false);
  });

  it("is equal to a predicate over the same keywords", () => {
    const predicate = new NameContainsKeywordsPredicate(["a", "b"]);

    expect(predicate.equals(new NameContainsKeywordsPredicate(["A", "B"]))).toBe(true);
    expect(predicate.equals(new NameContainsKeywordsPredicate(["a"]))).toBe(false);
    expect(predicate.equals(new TagsContainKeywordsPredicate(["a", "b"]))).toBe(false);
  });
});

describe("TagsContainKeywordsPredicate", () => {
  it("matches questions carrying any of the tags", () => {
    const predicate = new TagsContainKeywordsPredicate(["MATH", "sorting"]);

    expect(predicate.test(PRIME)).toBe(true);
    expect(predicate.test(SORTING)).toBe(true);
    expect(predicate.test(CAPITAL)).toBe(false);
    expect(predicate.test(EARTH_ROUND)).toBe(false);
  });
});
