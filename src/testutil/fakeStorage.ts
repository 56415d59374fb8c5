import type { Question } from "../domain/question/question.js";
import type { StorageService } from "../services/storage.service.js";

/** Keeps saved snapshots in memory; can be told to fail. */
export class FakeStorageService implements StorageService {
  public readonly saved: Array<readonly Question[]> = [];
  public failWith: Error | null = null;

  public constructor(private readonly stored: Question[] = []) {}

  public getQuestionBankFile(): string {
    return "test.sqlite";
  }

  public async readQuestionBank(): Promise<Question[]> {
    return [...this.stored];
  }

  public async saveQuestionBank(questions: readonly Question[]): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.saved.push(questions);
  }
}
