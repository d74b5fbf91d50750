/**
 * Fatal errors. The CLI prints `<label>: <message>` and then the tip, if any.
 */
export class ChangesError extends Error {
  readonly label: string = "Error";
  readonly tip: string | undefined;

  constructor(message: string, tip?: string) {
    super(message);
    this.name = new.target.name;
    this.tip = tip;
  }
}

export class NotAGitRepositoryError extends ChangesError {
  constructor() {
    super("Not a git repository", "Run this command from within a git repository.");
  }
}

export class EmptyRepositoryError extends ChangesError {
  constructor() {
    super("Repository has no commits yet.");
  }
}

export class MergeBaseNotFoundError extends ChangesError {
  readonly candidates: string[];

  constructor(target: string, candidates: string[]) {
    super(
      `Could not find merge base with ${target} branch.`,
      `Tip: Make sure '${target}' or 'master' branch exists, or use --uncommitted.`,
    );
    this.candidates = candidates;
  }
}

export class InsufficientHistoryError extends ChangesError {
  constructor() {
    super("Not enough commits for --since-last comparison.", "Tip: Repository needs at least 2 commits.");
  }
}

export class GitCommandError extends ChangesError {
  override readonly label = "Git error";

  constructor(args: string[], stderr: string) {
    super(stderr || `git ${args.join(" ")} failed`);
  }
}
