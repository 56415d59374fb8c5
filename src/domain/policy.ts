export const APP_NAME = "SmartNUS";

export const MIN_IMPORTANCE = 1 as const;
export const MAX_IMPORTANCE = 5 as const;
export const MIN_MCQ_CHOICES = 2 as const;

export type QuestionKind = "mcq" | "tf";
