import { Choice } from "../domain/choice.js";
import { Importance } from "../domain/question/importance.js";
import { MultipleChoiceQuestion } from "../domain/question/multipleChoiceQuestion.js";
import { Name } from "../domain/question/name.js";
import { Tag } from "../domain/question/tag.js";
import { TrueFalseQuestion } from "../domain/question/trueFalseQuestion.js";

/** Builds questions for tests, starting from a valid default. */
export class QuestionBuilder {
  public static readonly DEFAULT_NAME = "What is the capital of France?";
  public static readonly DEFAULT_IMPORTANCE = 2;
  public static readonly DEFAULT_TAGS: readonly string[] = ["geography"];

  #name: Name = new Name(QuestionBuilder.DEFAULT_NAME);
  #importance: Importance = new Importance(QuestionBuilder.DEFAULT_IMPORTANCE);
  #tags: Tag[] = QuestionBuilder.DEFAULT_TAGS.map((t) => new Tag(t));
  #choices: Choice[] = [
    new Choice("London", false),
    new Choice("Berlin", false),
    new Choice("Paris", true),
  ];

  public withName(name: string): this {
    this.#name = new Name(name);
    return this;
  }

  public withImportance(importance: number): this {
    this.#importance = new Importance(importance);
    return this;
  }

  public withTags(...tags: string[]): this {
    this.#tags = tags.map((t) => new Tag(t));
    return this;
  }

  /** The last title is the answer. */
  public withChoices(...titles: string[]): this {
    this.#choices = titles.map((t, i) => new Choice(t, i === titles.length - 1));
    return this;
  }

  public buildMcq(): MultipleChoiceQuestion {
    return new MultipleChoiceQuestion(
      this.#name,
      this.#importance,
      this.#tags,
      this.#choices
    );
  }

  public buildTf(answer: boolean): TrueFalseQuestion {
    return TrueFalseQuestion.fromAnswer(
      this.#name,
      this.#importance,
      this.#tags,
      answer
    );
  }
}
