import {
  UNSET,
  isSet,
  patchEquals,
  setTo,
  valueOr,
  type Patch,
} from "../domain/patch.js";
import type { Importance } from "../domain/question/importance.js";
import type { Name } from "../domain/question/name.js";
import type { Question } from "../domain/question/question.js";
import {
  sameMembers,
  uniqueTags,
} from "../domain/question/questionDetails.js";
import type { Tag } from "../domain/question/tag.js";

/**
 * The fields to change on a question. Each `with*` call returns a new
 * descriptor; unset fields keep the original question's value.
 */
export class EditQuestionDescriptor {
  public readonly name: Patch<Name>;
  public readonly importance: Patch<Importance>;
  /** An empty set here clears the question's tags. */
  public readonly tags: Patch<readonly Tag[]>;

  private constructor(
    name: Patch<Name>,
    importance: Patch<Importance>,
    tags: Patch<readonly Tag[]>
  ) {
    this.name = name;
    this.importance = importance;
    this.tags = tags;
  }

  public static empty(): EditQuestionDescriptor {
    return new EditQuestionDescriptor(UNSET, UNSET, UNSET);
  }

  public withName(name: Name): EditQuestionDescriptor {
    return new EditQuestionDescriptor(setTo(name), this.importance, this.tags);
  }

  public withImportance(importance: Importance): EditQuestionDescriptor {
    return new EditQuestionDescriptor(this.name, setTo(importance), this.tags);
  }

  public withTags(tags: Iterable<Tag>): EditQuestionDescriptor {
    return new EditQuestionDescriptor(
      this.name,
      this.importance,
      setTo(uniqueTags(tags))
    );
  }

  public isAnyFieldEdited(): boolean {
    return isSet(this.name) || isSet(this.importance) || isSet(this.tags);
  }

  /** Builds the edited copy of `question`; its choices are carried over as-is. */
  public applyTo(question: Question): Question {
    return question.withDetails({
      name: valueOr(this.name, question.getName()),
      importance: valueOr(this.importance, question.getImportance()),
      tags: valueOr(this.tags, question.getTags()),
    });
  }

  public equals(other: unknown): boolean {
    if (other === this) return true;
    if (!(other instanceof EditQuestionDescriptor)) return false;
    return (
      patchEquals(this.name, other.name, (a, b) => a.equals(b)) &&
      patchEquals(this.importance, other.importance, (a, b) => a.equals(b)) &&
      patchEquals(this.tags, other.tags, sameMembers)
    );
  }
}
