import type { Choice } from "../choice.js";
import type { Importance } from "./importance.js";
import type { Name } from "./name.js";
import type { Tag } from "./tag.js";

/** The fields every question variant carries besides its choices. */
export interface QuestionDetails {
  readonly name: Name;
  readonly importance: Importance;
  readonly tags: readonly Tag[];
}

interface ValueLike {
  equals(other: unknown): boolean;
}

/** Drops tags whose name was already seen; first occurrence wins. */
export function uniqueTags(tags: Iterable<Tag>): readonly Tag[] {
  const result: Tag[] = [];
  for (const tag of tags) {
    if (!result.some((t) => t.equals(tag))) result.push(tag);
  }
  return Object.freeze(result);
}

/** Set equality over value objects, ignoring order. */
export function sameMembers<T extends ValueLike>(
  a: readonly T[],
  b: readonly T[]
): boolean {
  return (
    a.length === b.length &&
    a.every((x) => b.some((y) => y.equals(x))) &&
    b.every((y) => a.some((x) => x.equals(y)))
  );
}

export function renderQuestion(
  details: QuestionDetails,
  choices: readonly Choice[]
): string {
  const head = `${details.name.fullName}; Importance: ${details.importance.value}; Choices: ${choices
    .map((c) => c.toString())
    .join(", ")}`;
  return details.tags.length
    ? `${head}; Tags: ${details.tags.map((t) => t.toString()).join("")}`
    : head;
}
