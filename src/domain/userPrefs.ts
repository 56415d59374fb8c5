export interface UserPrefs {
  /** Where the question bank is persisted. */
  readonly questionBankFile: string;
}

export const DEFAULT_USER_PREFS: UserPrefs = Object.freeze({
  questionBankFile: "./data/smartnus.sqlite",
});
