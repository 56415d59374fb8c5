import readline from "node:readline";
import { isAppError } from "../domain/errors.js";
import { logger } from "../logger.js";
import type { LogicService } from "../services/logic.service.js";
import { renderHelp, renderQuestionList, renderWelcome } from "./views.js";

export const MESSAGE_UNEXPECTED_ERROR =
  "Sorry, an error occurred while processing your command.";

export interface ReplOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Closes the shell when aborted, e.g. on SIGINT. */
  signal?: AbortSignal;
  prompt?: string;
}

/**
 * Reads commands line by line until `exit`, end of input or abort. Rejected
 * commands print their message and the loop carries on.
 */
export async function runRepl(
  logic: LogicService,
  {
    input = process.stdin,
    output = process.stdout,
    signal,
    prompt = "> ",
  }: ReplOptions = {}
): Promise<void> {
  const rl = readline.createInterface({ input, output, terminal: false });
  const print = (text: string): void => {
    output.write(`${text}\n`);
  };
  const onAbort = (): void => rl.close();
  signal?.addEventListener("abort", onAbort, { once: true });

  const shown = logic.getFilteredQuestionList();
  print(renderWelcome(logic.getQuestionBankFile(), shown.length));
  print(renderQuestionList(shown));
  rl.setPrompt(prompt);
  rl.prompt();

  try {
    // Leaving the loop, by break or end of input, closes the interface.
    for await (const line of rl) {
      if (line.trim() !== "") {
        const keepGoing: boolean = await handleLine(logic, line, print);
        if (!keepGoing) break;
      }
      rl.prompt();
    }
  } finally {
    signal?.removeEventListener("abort", onAbort);
  }
}

async function handleLine(
  logic: LogicService,
  line: string,
  print: (text: string) => void
): Promise<boolean> {
  try {
    const result = await logic.execute(line);
    print(result.feedbackToUser);
    if (result.exit) return false;
    print(
      result.showHelp
        ? renderHelp(logic.getUsages())
        : renderQuestionList(logic.getFilteredQuestionList())
    );
  } catch (error) {
    if (isAppError(error)) {
      print(error.message);
    } else {
      logger.error(`Error handling input "${line}":`, error);
      print(MESSAGE_UNEXPECTED_ERROR);
    }
  }
  return true;
}
