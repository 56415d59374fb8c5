import { Choice } from "../choice.js";
import { BaseQuestion, type ChoiceRules } from "./baseQuestion.js";
import type { Importance } from "./importance.js";
import type { Name } from "./name.js";
import type { QuestionDetails } from "./questionDetails.js";
import type { Tag } from "./tag.js";

const TRUE_FALSE_RULES: ChoiceRules = {
  message: `True/false questions have exactly the choices ${Choice.TRUE_CHOICE_TITLE} and ${Choice.FALSE_CHOICE_TITLE} with one answer`,
  findAnswer: (choices) => {
    if (choices.length !== 2) return undefined;
    const titles: string[] = choices.map((c) => c.getTitle());
    if (
      !titles.includes(Choice.TRUE_CHOICE_TITLE) ||
      !titles.includes(Choice.FALSE_CHOICE_TITLE)
    ) {
      return undefined;
    }
    const answers: Choice[] = choices.filter((c) => c.getIsCorrect());
    return answers.length === 1 ? answers[0] : undefined;
  },
};

export class TrueFalseQuestion extends BaseQuestion {
  public static readonly MESSAGE_CONSTRAINTS = TRUE_FALSE_RULES.message;

  public readonly kind = "tf" as const;

  public constructor(
    name: Name,
    importance: Importance,
    tags: Iterable<Tag>,
    choices: Iterable<Choice>
  ) {
    super(name, importance, tags, choices, TRUE_FALSE_RULES);
  }

  public static fromAnswer(
    name: Name,
    importance: Importance,
    tags: Iterable<Tag>,
    answer: boolean
  ): TrueFalseQuestion {
    return new TrueFalseQuestion(name, importance, tags, [
      new Choice(Choice.TRUE_CHOICE_TITLE, answer),
      new Choice(Choice.FALSE_CHOICE_TITLE, !answer),
    ]);
  }

  public withDetails(details: QuestionDetails): TrueFalseQuestion {
    return new TrueFalseQuestion(
      details.name,
      details.importance,
      details.tags,
      this.getChoices()
    );
  }
}
