import { beforeEach, describe, expect, it } from "vitest";
import {
  DuplicateQuestionError,
  MESSAGE_DUPLICATE_QUESTION,
} from "../domain/errors.js";
import type { Model } from "../model/model.js";
import { ModelManager } from "../model/modelManager.js";
import {
  assertCommandFailure,
  assertCommandSuccess,
} from "../testutil/commandTestUtil.js";
import { QuestionBuilder } from "../testutil/questionBuilder.js";
import {
  CAPITAL,
  EARTH_ROUND,
  OCEAN,
  PRIME,
  SORTING,
  getTypicalQuestions,
} from "../testutil/typicalQuestions.js";
import { AddCommand } from "./addCommand.js";

describe("AddCommand", () => {
  let model: Model;

  beforeEach(() => {
    model = new ModelManager(getTypicalQuestions());
  });

  it("appends a new question", () => {
    assertCommandSuccess(
      new AddCommand(OCEAN),
      model,
      "New question added: Which is the largest ocean?; Importance: 4; Choices: Atlantic, Indian, Pacific (answer); Tags: [geography]",
      [CAPITAL, PRIME, SORTING, EARTH_ROUND, OCEAN]
    );
  });

  it("refuses a question whose name is taken", () => {
    const sameName = new QuestionBuilder().withImportance(5).buildTf(false);

    assertCommandFailure(
      new AddCommand(sameName),
      model,
      DuplicateQuestionError,
      MESSAGE_DUPLICATE_QUESTION
    );
  });

  it("leaves the active filter in place", () => {
    model.updateFilteredQuestionList((q) => q === PRIME);

    new AddCommand(OCEAN).execute(model);

    expect(model.getFilteredQuestionList()).toEqual([PRIME]);
  });
});
