import type { Choice } from "../choice.js";
import { ValidationError } from "../errors.js";
import type { QuestionKind } from "../policy.js";
import type { Importance } from "./importance.js";
import type { Name } from "./name.js";
import {
  detailsOf,
  type Question,
  type QuestionCapabilities,
} from "./question.js";
import {
  renderQuestion,
  sameMembers,
  uniqueTags,
  type QuestionDetails,
} from "./questionDetails.js";
import type { Tag } from "./tag.js";

/** How a variant picks its answer out of a candidate set of choices. */
export interface ChoiceRules {
  /** The single correct choice, or undefined when `choices` break the rules. */
  findAnswer(choices: readonly Choice[]): Choice | undefined;
  readonly message: string;
}

/**
 * Fields and behaviour shared by every question variant. Variants supply
 * their choice rules and how to rebuild themselves with new details.
 */
export abstract class BaseQuestion implements QuestionCapabilities {
  public abstract readonly kind: QuestionKind;
  private readonly name: Name;
  private readonly importance: Importance;
  private readonly tags: readonly Tag[];
  private readonly choices: readonly Choice[];
  private readonly answer: Choice;

  protected constructor(
    name: Name,
    importance: Importance,
    tags: Iterable<Tag>,
    choices: Iterable<Choice>,
    rules: ChoiceRules
  ) {
    const choiceList: readonly Choice[] = Object.freeze([...choices]);
    const answer: Choice | undefined = rules.findAnswer(choiceList);
    if (!answer) {
      throw new ValidationError(rules.message);
    }
    this.name = name;
    this.importance = importance;
    this.tags = uniqueTags(tags);
    this.choices = choiceList;
    this.answer = answer;
  }

  public getName(): Name {
    return this.name;
  }

  public getImportance(): Importance {
    return this.importance;
  }

  public getTags(): readonly Tag[] {
    return this.tags;
  }

  public getChoices(): readonly Choice[] {
    return this.choices;
  }

  public getAnswer(): Choice {
    return this.answer;
  }

  public isSameQuestion(other: QuestionCapabilities): boolean {
    return other === this || other.getName().equals(this.name);
  }

  public abstract withDetails(details: QuestionDetails): Question;

  /** Same variant, and equal fields; tag and choice order do not matter. */
  public equals(other: unknown): boolean {
    if (other === this) return true;
    if (!(other instanceof BaseQuestion) || other.kind !== this.kind) {
      return false;
    }
    return (
      other.name.equals(this.name) &&
      other.importance.equals(this.importance) &&
      sameMembers(other.tags, this.tags) &&
      sameMembers(other.choices, this.choices)
    );
  }

  public toString(): string {
    return renderQuestion(detailsOf(this), this.choices);
  }
}
