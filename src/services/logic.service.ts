import type { Command } from "../commands/baseCommand.js";
import type { CommandResult } from "../commands/commandResult.js";
import type { Question } from "../domain/question/question.js";
import { logger } from "../logger.js";
import type { Model } from "../model/model.js";
import type { CommandFactory } from "../parser/commandFactory.js";
import type { StorageService } from "./storage.service.js";

export interface LogicService {
  /**
   * Parses and runs one line of input, then persists the bank if the
   * command can change it. Throws the command's AppError when it is
   * rejected.
   */
  execute(commandText: string): Promise<CommandResult>;
  getFilteredQuestionList(): readonly Question[];
  getUsages(): string[];
  getQuestionBankFile(): string;
}

export class LogicManager implements LogicService {
  readonly #model: Model;
  readonly #commandFactory: CommandFactory;
  readonly #storage: StorageService;

  public constructor(
    model: Model,
    commandFactory: CommandFactory,
    storage: StorageService
  ) {
    this.#model = model;
    this.#commandFactory = commandFactory;
    this.#storage = storage;
  }

  public async execute(commandText: string): Promise<CommandResult> {
    logger.info(`[USER COMMAND] ${commandText}`);
    const command: Command = this.#commandFactory.createCommand(commandText);
    const result: CommandResult = command.execute(this.#model);
    if (command.mutatesModel()) {
      await this.#storage.saveQuestionBank(this.#model.getQuestionList());
    }
    return result;
  }

  public getFilteredQuestionList(): readonly Question[] {
    return this.#model.getFilteredQuestionList();
  }

  public getUsages(): string[] {
    return this.#commandFactory.getUsages();
  }

  public getQuestionBankFile(): string {
    return this.#model.getQuestionBankFile();
  }
}
