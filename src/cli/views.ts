import type { Question } from "../domain/question/question.js";
import type { QuestionKind } from "../domain/policy.js";
import { APP_NAME } from "../domain/policy.js";

const KIND_LABELS: Record<QuestionKind, string> = {
  mcq: "[MCQ]",
  tf: "[T/F]",
};

export function renderQuestionLine(position: number, question: Question): string {
  return `${position}. ${KIND_LABELS[question.kind]} ${question.toString()}`;
}

export function renderQuestionList(questions: readonly Question[]): string {
  if (questions.length === 0) return "No questions to show.";
  return questions.map((q, i) => renderQuestionLine(i + 1, q)).join("\n");
}

export function renderHelp(usages: readonly string[]): string {
  return [`${APP_NAME} commands:`, ...usages].join("\n\n");
}

export function renderWelcome(questionBankFile: string, count: number): string {
  return `Welcome to ${APP_NAME}! ${count} questions loaded from ${questionBankFile}.\nType "help" to see the commands.`;
}
