import { DataLoadingError, StorageError } from "../domain/errors.js";
import type { Question } from "../domain/question/question.js";
import type { QuestionBankRepository } from "../db/questionBankRepository.js";
import { logger } from "../logger.js";

export const FILE_OPS_ERROR_MESSAGE = "Could not save data to file: ";

export interface StorageService {
  getQuestionBankFile(): string;
  readQuestionBank(): Promise<Question[]>;
  saveQuestionBank(questions: readonly Question[]): Promise<void>;
}

export function createStorageService(
  repository: QuestionBankRepository,
  questionBankFile: string
): StorageService {
  return {
    getQuestionBankFile: () => questionBankFile,
    readQuestionBank: async () => {
      try {
        return await repository.loadQuestions();
      } catch (error) {
        logger.error(`Error reading question bank from ${questionBankFile}:`, error);
        throw new DataLoadingError(
          `Stored questions in ${questionBankFile} are invalid: ${
            error instanceof Error ? error.message : String(error)
          }`,
          { cause: error }
        );
      }
    },
    saveQuestionBank: async (questions) => {
      try {
        await repository.saveQuestions(questions);
        logger.debug(`Saved ${questions.length} questions to ${questionBankFile}`);
      } catch (error) {
        logger.error("Error saving question bank:", error);
        throw new StorageError(
          FILE_OPS_ERROR_MESSAGE +
            (error instanceof Error ? error.message : String(error)),
          { cause: error }
        );
      }
    },
  };
}
