export interface CommandResultOptions {
  /** The shell should print the command reference. */
  showHelp?: boolean;
  /** The shell should close after printing the feedback. */
  exit?: boolean;
}

export class CommandResult {
  public readonly feedbackToUser: string;
  public readonly showHelp: boolean;
  public readonly exit: boolean;

  public constructor(
    feedbackToUser: string,
    { showHelp = false, exit = false }: CommandResultOptions = {}
  ) {
    this.feedbackToUser = feedbackToUser;
    this.showHelp = showHelp;
    this.exit = exit;
  }

  public equals(other: unknown): boolean {
    return (
      other === this ||
      (other instanceof CommandResult &&
        other.feedbackToUser === this.feedbackToUser &&
        other.showHelp === this.showHelp &&
        other.exit === this.exit)
    );
  }
}
