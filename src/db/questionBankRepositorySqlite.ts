import type { Database, RunResult } from "sqlite3";
import { z } from "zod";
import type { Question } from "../domain/question/question.js";
import type { QuestionBankRepository } from "./questionBankRepository.js";
import {
  QuestionRecordSchema,
  toQuestion,
  toRecord,
  type QuestionRecord,
} from "./questionRecord.js";
import { getDb, inTransaction } from "./sqlite.js";

const SEEDED_KEY = "seeded";

const QuestionRow = z.object({
  id: z.number().int(),
  kind: z.enum(["mcq", "tf"]),
  name: z.string(),
  importance: z.number().int(),
});

const ChoiceRow = z.object({
  question_id: z.number().int(),
  title: z.string(),
  is_correct: z.union([z.literal(0), z.literal(1)]),
});

const TagRow = z.object({
  question_id: z.number().int(),
  tag: z.string(),
});

export class QuestionBankRepositorySqlite implements QuestionBankRepository {
  private readonly db: Database;

  public constructor(db: Database = getDb()) {
    this.db = db;
  }

  public async countQuestions(): Promise<number> {
    const rows = await this.all(`SELECT COUNT(*) AS c FROM questions`);
    return z.array(z.object({ c: z.number().int() })).parse(rows)[0]?.c ?? 0;
  }

  public async loadQuestions(): Promise<Question[]> {
    const questions = z.array(QuestionRow).parse(
      await this.all(
        `SELECT id, kind, name, importance FROM questions ORDER BY position ASC`
      )
    );
    const choices = z.array(ChoiceRow).parse(
      await this.all(
        `SELECT question_id, title, is_correct FROM choices
          ORDER BY question_id ASC, order_index ASC`
      )
    );
    const tags = z.array(TagRow).parse(
      await this.all(
        `SELECT question_id, tag FROM question_tags
          ORDER BY question_id ASC, order_index ASC`
      )
    );

    return questions.map((q) => {
      const record: QuestionRecord = QuestionRecordSchema.parse({
        kind: q.kind,
        name: q.name,
        importance: q.importance,
        tags: tags.filter((t) => t.question_id === q.id).map((t) => t.tag),
        choices: choices
          .filter((c) => c.question_id === q.id)
          .map((c) => ({ title: c.title, correct: c.is_correct === 1 })),
      });
      return toQuestion(record);
    });
  }

  public async saveQuestions(questions: readonly Question[]): Promise<void> {
    await inTransaction(
      (sql) => this.run(sql),
      () => this.replaceAll(questions)
    );
  }

  public async seedQuestions(questions: readonly Question[]): Promise<void> {
    await inTransaction(
      (sql) => this.run(sql),
      async () => {
        await this.replaceAll(questions);
        await this.markSeeded();
      }
    );
  }

  public async isSeeded(): Promise<boolean> {
    const rows = await this.all(`SELECT value FROM meta WHERE key = ?`, [
      SEEDED_KEY,
    ]);
    return rows.length > 0;
  }

  public async markSeeded(): Promise<void> {
    await this.run(`INSERT OR IGNORE INTO meta (key, value) VALUES (?, '1')`, [
      SEEDED_KEY,
    ]);
  }

  private async replaceAll(questions: readonly Question[]): Promise<void> {
    await this.run(`DELETE FROM question_tags`);
    await this.run(`DELETE FROM choices`);
    await this.run(`DELETE FROM questions`);

    let position = 0;
    for (const question of questions) {
      const record: QuestionRecord = toRecord(question);
      const { lastID } = await this.run(
        `INSERT INTO questions (position, kind, name, importance)
         VALUES (?, ?, ?, ?)`,
        [position++, record.kind, record.name, record.importance]
      );
      let choiceIndex = 0;
      for (const choice of record.choices) {
        await this.run(
          `INSERT INTO choices (question_id, order_index, title, is_correct)
           VALUES (?, ?, ?, ?)`,
          [lastID, choiceIndex++, choice.title, choice.correct ? 1 : 0]
        );
      }
      let tagIndex = 0;
      for (const tag of record.tags) {
        await this.run(
          `INSERT INTO question_tags (question_id, order_index, tag)
           VALUES (?, ?, ?)`,
          [lastID, tagIndex++, tag]
        );
      }
    }
  }

  /* ------------ small typed helpers ------------ */
  private run(sql: string, params: readonly unknown[] = []): Promise<RunResult> {
    return new Promise<RunResult>((resolve, reject) => {
      this.db.run(sql, params, function (this: RunResult, err: Error | null) {
        if (err) {
          reject(err);
          return;
        }
        resolve(this);
      });
    });
  }

  private all(sql: string, params: readonly unknown[] = []): Promise<unknown[]> {
    return new Promise<unknown[]>((resolve, reject) => {
      this.db.all(sql, params, (err: Error | null, rows: unknown[]) =>
        err ? reject(err) : resolve(rows)
      );
    });
  }
}
