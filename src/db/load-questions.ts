import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { DataLoadingError } from "../domain/errors.js";
import type { Question } from "../domain/question/question.js";
import { UniqueQuestionList } from "../domain/questionList.js";
import { QuestionRecordSchema, toQuestion } from "./questionRecord.js";

// Accept both: array of questions OR { questions: [...] }
const QuestionsFileSchema = z.union([
  z.array(QuestionRecordSchema),
  z.object({ questions: z.array(QuestionRecordSchema) }),
]);

function describeError(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reads a JSON question file (the sample questions, or an export) into
 * validated questions.
 */
export function readQuestionsFile(filePath: string): Question[] {
  const resolved: string = path.resolve(filePath);
  try {
    const raw: string = fs.readFileSync(resolved, "utf8");
    const parsed = QuestionsFileSchema.parse(JSON.parse(raw));
    const records = Array.isArray(parsed) ? parsed : parsed.questions;
    const questions: Question[] = records.map(toQuestion);
    if (!UniqueQuestionList.questionsAreUnique(questions)) {
      throw new Error("the file contains two questions with the same name");
    }
    return questions;
  } catch (error) {
    throw new DataLoadingError(
      `Could not load questions from ${filePath}: ${describeError(error)}`,
      { cause: error }
    );
  }
}
