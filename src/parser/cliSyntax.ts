/** Argument prefixes understood by the command parser. */
export const PREFIX_NAME = "n/";
export const PREFIX_IMPORTANCE = "i/";
export const PREFIX_CHOICE = "c/";
export const PREFIX_ANSWER = "a/";
export const PREFIX_TAG = "t/";

export const QUESTION_KIND_MCQ = "mcq";
export const QUESTION_KIND_TF = "tf";
