import { z } from "zod";
import { Choice } from "../domain/choice.js";
import { Importance } from "../domain/question/importance.js";
import { MultipleChoiceQuestion } from "../domain/question/multipleChoiceQuestion.js";
import { Name } from "../domain/question/name.js";
import type { Question } from "../domain/question/question.js";
import { Tag } from "../domain/question/tag.js";
import { TrueFalseQuestion } from "../domain/question/trueFalseQuestion.js";

/* ---------------- storage-neutral shape of one question ---------------- */

export const QuestionRecordSchema = z.object({
  kind: z.enum(["mcq", "tf"]),
  name: z.string(),
  importance: z.number().int(),
  tags: z.array(z.string()).default([]),
  choices: z.array(
    z.object({
      title: z.string(),
      correct: z.boolean(),
    })
  ),
});

export type QuestionRecord = z.infer<typeof QuestionRecordSchema>;

/**
 * Rebuilds a question from a record. Domain constraints are checked by the
 * value objects, so a bad record throws their ValidationError.
 */
export function toQuestion(record: QuestionRecord): Question {
  const name = new Name(record.name);
  const importance = new Importance(record.importance);
  const tags: Tag[] = record.tags.map((t) => new Tag(t));
  const choices: Choice[] = record.choices.map(
    (c) => new Choice(c.title, c.correct)
  );
  switch (record.kind) {
    case "mcq":
      return new MultipleChoiceQuestion(name, importance, tags, choices);
    case "tf":
      return new TrueFalseQuestion(name, importance, tags, choices);
  }
}

export function toRecord(question: Question): QuestionRecord {
  return {
    kind: question.kind,
    name: question.getName().fullName,
    importance: question.getImportance().value,
    tags: question.getTags().map((t) => t.tagName),
    choices: question.getChoices().map((c) => ({
      title: c.getTitle(),
      correct: c.getIsCorrect(),
    })),
  };
}
