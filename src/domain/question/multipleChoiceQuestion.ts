import type { Choice } from "../choice.js";
import { MIN_MCQ_CHOICES } from "../policy.js";
import { BaseQuestion, type ChoiceRules } from "./baseQuestion.js";
import type { Importance } from "./importance.js";
import type { Name } from "./name.js";
import type { QuestionDetails } from "./questionDetails.js";
import type { Tag } from "./tag.js";

const MESSAGE_CONSTRAINTS = `Multiple choice questions need at least ${MIN_MCQ_CHOICES} choices with distinct titles and exactly one answer`;

const MULTIPLE_CHOICE_RULES: ChoiceRules = {
  message: MESSAGE_CONSTRAINTS,
  findAnswer: (choices) => {
    if (choices.length < MIN_MCQ_CHOICES) return undefined;
    const distinctTitles: boolean = choices.every(
      (c, i) => choices.findIndex((o) => o.hasSameTitle(c)) === i
    );
    const answers: Choice[] = choices.filter((c) => c.getIsCorrect());
    return distinctTitles && answers.length === 1 ? answers[0] : undefined;
  },
};

export class MultipleChoiceQuestion extends BaseQuestion {
  public static readonly MESSAGE_CONSTRAINTS = MESSAGE_CONSTRAINTS;

  public readonly kind = "mcq" as const;

  public constructor(
    name: Name,
    importance: Importance,
    tags: Iterable<Tag>,
    choices: Iterable<Choice>
  ) {
    super(name, importance, tags, choices, MULTIPLE_CHOICE_RULES);
  }

  public withDetails(details: QuestionDetails): MultipleChoiceQuestion {
    return new MultipleChoiceQuestion(
      details.name,
      details.importance,
      details.tags,
      this.getChoices()
    );
  }
}
