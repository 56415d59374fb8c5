import type { Index } from "../domain/displayIndex.js";
import { IndexOutOfRangeError } from "../domain/errors.js";
import type { Question } from "../domain/question/question.js";
import type { Model } from "../model/model.js";
import { BaseCommand } from "./baseCommand.js";

/** A command aimed at one entry of the list the user is looking at. */
export abstract class IndexedCommand<TPlan> extends BaseCommand<TPlan> {
  public readonly index: Index;

  protected constructor(index: Index) {
    super();
    this.index = index;
  }

  protected resolveTarget(model: Model): Question {
    const lastShownList: readonly Question[] = model.getFilteredQuestionList();
    const position: number = this.index.getZeroBased();
    if (position >= lastShownList.length) {
      throw new IndexOutOfRangeError();
    }
    return lastShownList[position];
  }
}
