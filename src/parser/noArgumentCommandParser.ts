import type { Command } from "../commands/baseCommand.js";
import type { CommandParser } from "./commandParser.js";

/** For command words that take no arguments; anything after them is ignored. */
export class NoArgumentCommandParser implements CommandParser {
  readonly #commandId: string;
  readonly #usage: string;
  readonly #create: () => Command;

  public constructor(commandId: string, usage: string, create: () => Command) {
    this.#commandId = commandId;
    this.#usage = usage;
    this.#create = create;
  }

  public getCommandId(): string {
    return this.#commandId;
  }

  public getUsage(): string {
    return this.#usage;
  }

  public parse(): Command {
    return this.#create();
  }
}
