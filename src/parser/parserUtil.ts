import { format } from "node:util";
import { Choice } from "../domain/choice.js";
import { Index } from "../domain/displayIndex.js";
import { ParseError } from "../domain/errors.js";
import { Importance } from "../domain/question/importance.js";
import { Name } from "../domain/question/name.js";
import { Tag } from "../domain/question/tag.js";
import {
  MESSAGE_INVALID_COMMAND_FORMAT,
  MESSAGE_INVALID_TF_ANSWER,
} from "./messages.js";

export function invalidFormat(usage: string): ParseError {
  return new ParseError(format(MESSAGE_INVALID_COMMAND_FORMAT, usage));
}

/** Parses a 1-based index such as `3`; leading and trailing spaces are ignored. */
export function parseIndex(oneBasedIndex: string): Index {
  const trimmed: string = oneBasedIndex.trim();
  if (!/^[1-9]\d*$/.test(trimmed) || !Number.isSafeInteger(Number(trimmed))) {
    throw new ParseError(Index.MESSAGE_INVALID_INDEX);
  }
  return Index.fromOneBased(Number(trimmed));
}

export function parseName(name: string): Name {
  return new Name(name.trim());
}

export function parseImportance(importance: string): Importance {
  return Importance.fromString(importance);
}

export function parseTag(tag: string): Tag {
  return new Tag(tag.trim());
}

export function parseTags(tags: readonly string[]): Tag[] {
  return tags.map(parseTag);
}

export function parseChoice(title: string, isCorrect: boolean): Choice {
  return new Choice(title.trim(), isCorrect);
}

export function parseTrueFalseAnswer(answer: string): boolean {
  const normalised: string = answer.trim().toLowerCase();
  if (normalised === "true") return true;
  if (normalised === "false") return false;
  throw new ParseError(MESSAGE_INVALID_TF_ANSWER);
}
