import type { Command } from "../commands/baseCommand.js";

/** Turns the arguments of one command word into a command. */
export interface CommandParser {
  getCommandId(): string;
  getUsage(): string;
  /** `args` is everything after the command word, untrimmed. */
  parse(args: string): Command;
}
