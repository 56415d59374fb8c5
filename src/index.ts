#!/usr/bin/env node
import { Command } from "commander";
import { runRepl } from "./cli/repl.js";
import { loadConfig } from "./config.js";
import { QuestionBankRepositorySqlite } from "./db/questionBankRepositorySqlite.js";
import { seedSampleQuestions } from "./db/seed.js";
import { closeDb, initDb } from "./db/sqlite.js";
import { DataLoadingError } from "./domain/errors.js";
import type { Question } from "./domain/question/question.js";
import { installGlobalErrorHandlers } from "./infra/global-errors.js";
import { logger } from "./logger.js";
import { ModelManager } from "./model/modelManager.js";
import { createCommandFactory } from "./parser/commands.js";
import { LogicManager } from "./services/logic.service.js";
import type { Services } from "./services/services.js";
import {
  createStorageService,
  type StorageService,
} from "./services/storage.service.js";

interface CliOptions {
  db: string;
  seed: string | false;
}

async function readOrStartEmpty(storage: StorageService): Promise<Question[]> {
  try {
    return await storage.readQuestionBank();
  } catch (error) {
    if (!(error instanceof DataLoadingError)) throw error;
    logger.warn(`${error.message}. Starting with an empty question bank.`);
    return [];
  }
}

async function main(): Promise<void> {
  const config = loadConfig();

  const program = new Command()
    .name("smartnus")
    .description("Manage a local bank of quiz questions with text commands")
    .version("0.1.0")
    .option(
      "-d, --db <file>",
      "sqlite file holding the question bank",
      config.DB_FILE
    )
    .option(
      "-s, --seed <file>",
      "JSON questions used to fill an empty bank",
      config.SEED_FILE
    )
    .option("--no-seed", "start an empty bank without the sample questions")
    .parse();
  const opts = program.opts<CliOptions>();

  const db = await initDb(opts.db);
  const repository = new QuestionBankRepositorySqlite(db);
  if (opts.seed !== false) {
    await seedSampleQuestions(repository, opts.seed);
  }

  const storageService = createStorageService(repository, opts.db);
  const questions = await readOrStartEmpty(storageService);
  const model = new ModelManager(questions, { questionBankFile: opts.db });
  const services: Services = {
    storageService,
    logicService: new LogicManager(
      model,
      createCommandFactory(),
      storageService
    ),
  };

  const shutdown = new AbortController();
  installGlobalErrorHandlers(() => shutdown.abort());

  logger.info(`SmartNUS started with ${questions.length} questions.`);
  await runRepl(services.logicService, { signal: shutdown.signal });

  await closeDb();
  logger.info("SmartNUS stopped.");
}

main().catch((e: unknown) => {
  logger.error("Fatal error during startup", e);
  console.error(e instanceof Error ? e.message : e);
  process.exit(1);
});
