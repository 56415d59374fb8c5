import { isAppError } from "../domain/errors.js";
import { logger } from "../logger.js";
import type { Model } from "../model/model.js";
import type { CommandResult } from "./commandResult.js";

/** A parsed, ready-to-run user command. */
export interface Command {
  execute(model: Model): CommandResult;
  getCommandId(): string;
  /** Whether a successful run can change the question bank. */
  mutatesModel(): boolean;
}

/**
 * Runs in two phases. `validate` checks everything against the model and
 * returns what `process` needs; it must not mutate. `process` commits. A
 * failing command therefore leaves the model untouched.
 */
export abstract class BaseCommand<TPlan = void> implements Command {
  public execute(model: Model): CommandResult {
    const commandId: string = this.getCommandId();
    logger.debug(`Executing command ${commandId}`);
    try {
      const plan: TPlan = this.validate(model);
      return this.process(model, plan);
    } catch (error) {
      if (isAppError(error)) {
        logger.info(`Command ${commandId} rejected: ${error.message}`);
      } else {
        logger.error(`Error in command ${commandId} execution:`, error);
      }
      throw error;
    }
  }

  protected abstract validate(model: Model): TPlan;

  protected abstract process(model: Model, plan: TPlan): CommandResult;

  public abstract getCommandId(): string;

  public mutatesModel(): boolean {
    return true;
  }
}
