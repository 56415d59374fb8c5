import fs from "node:fs";
import type { Question } from "../domain/question/question.js";
import { logger } from "../logger.js";
import { readQuestionsFile } from "./load-questions.js";
import type { QuestionBankRepository } from "./questionBankRepository.js";

/**
 * Fills a new question bank from a JSON file, once. Returns how many
 * questions were written: 0 when the bank was seeded before, already holds
 * questions, or the file is absent.
 */
export async function seedSampleQuestions(
  repository: QuestionBankRepository,
  seedFile: string
): Promise<number> {
  if (await repository.isSeeded()) return 0;
  if ((await repository.countQuestions()) > 0) {
    // A bank filled by hand never gets the samples later.
    await repository.markSeeded();
    return 0;
  }
  if (!fs.existsSync(seedFile)) {
    logger.warn(`Seed file ${seedFile} not found; starting with an empty bank`);
    return 0;
  }

  const questions: Question[] = readQuestionsFile(seedFile);
  await repository.seedQuestions(questions);
  logger.info(`Seeded ${questions.length} sample questions from ${seedFile}`);
  return questions.length;
}
