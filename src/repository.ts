import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { execa } from "execa";
import type { ChangeSource, CommitInfo, ComparisonInfo, FileChange, Mode } from "./types.js";
import { UNCOMMITTED } from "./types.js";
import { COMMIT_LOG_FORMAT, countLines, isBinaryContent, parseCommitInfo, parseNumstat } from "./git.js";
import {
  EmptyRepositoryError,
  GitCommandError,
  InsufficientHistoryError,
  MergeBaseNotFoundError,
  NotAGitRepositoryError,
} from "./errors.js";
import { DEFAULT_BASE_BRANCH } from "./config.js";
import { logger } from "./logger.js";

function describeError(error: unknown): string {
  if (error instanceof Error) {
    if ("stderr" in error && typeof error.stderr === "string" && error.stderr.trim()) {
      return error.stderr.trim();
    }
    return error.message;
  }
  return String(error);
}

// Each lookup may hold a git child process and its pipes open.
export const LOC_LOOKUP_CONCURRENCY = 8;

/** Candidate branches for the merge base, in lookup order. */
export function mergeBaseCandidates(target: string): string[] {
  return [...new Set([target, `origin/${target}`, "master", "origin/master"])];
}

/**
 * A git working copy, queried through the git binary.
 */
export class GitRepository implements ChangeSource {
  private constructor(
    readonly root: string,
    private readonly baseBranch: string,
  ) {}

  static async open(cwd: string, baseBranch: string = DEFAULT_BASE_BRANCH): Promise<GitRepository> {
    let root: string;
    try {
      const { stdout } = await execa("git", ["rev-parse", "--show-toplevel"], { cwd });
      root = stdout.trim();
    } catch {
      throw new NotAGitRepositoryError();
    }

    try {
      await execa("git", ["rev-parse", "--verify", "--quiet", "HEAD"], { cwd: root });
    } catch {
      throw new EmptyRepositoryError();
    }

    return new GitRepository(root, baseBranch);
  }

  private async git(args: string[]): Promise<string> {
    try {
      const { stdout } = await execa("git", args, { cwd: this.root, stripFinalNewline: false });
      return stdout;
    } catch (error) {
      throw new GitCommandError(args, describeError(error));
    }
  }

  private async tryGit(args: string[]): Promise<string | null> {
    try {
      return await this.git(args);
    } catch (error) {
      logger.debug("git command failed", { args, error: describeError(error) });
      return null;
    }
  }

  async getMergeBase(): Promise<string> {
    const candidates = mergeBaseCandidates(this.baseBranch);
    for (const branch of candidates) {
      const output = await this.tryGit(["merge-base", "HEAD", branch]);
      if (output?.trim()) return output.trim();
    }
    throw new MergeBaseNotFoundError(this.baseBranch, candidates);
  }

  private async diffArgs(mode: Mode): Promise<string[]> {
    switch (mode) {
      case "uncommitted":
        // Staged + unstaged vs HEAD
        return ["diff", "--numstat", "HEAD"];
      case "since-last": {
        const previous = await this.tryGit(["rev-parse", "--verify", "--quiet", "HEAD~1^{commit}"]);
        if (previous === null) throw new InsufficientHistoryError();
        return ["diff", "--numstat", "HEAD~1", "HEAD"];
      }
      case "default":
        return ["diff", "--numstat", await this.getMergeBase(), "HEAD"];
    }
  }

  async getChanges(mode: Mode): Promise<FileChange[]> {
    const output = await this.git(await this.diffArgs(mode));
    const changes = parseNumstat(output);

    for (let start = 0; start < changes.length; start += LOC_LOOKUP_CONCURRENCY) {
      const batch = changes.slice(start, start + LOC_LOOKUP_CONCURRENCY);
      const locs = await Promise.all(batch.map((change) => this.getFileLoc(change.path, mode)));
      batch.forEach((change, i) => {
        change.loc = locs[i];
      });
    }

    return changes;
  }

  /**
   * Current line count: working tree for uncommitted mode, HEAD otherwise.
   * Missing, unreadable and binary files count as null.
   */
  async getFileLoc(filePath: string, mode: Mode): Promise<number | null> {
    try {
      let content: string;
      if (mode === "uncommitted") {
        const fullPath = path.join(this.root, filePath);
        if (!(await stat(fullPath)).isFile()) return null;
        content = await readFile(fullPath, "utf8");
      } else {
        const { stdout } = await execa("git", ["show", `HEAD:${filePath}`], {
          cwd: this.root,
          stripFinalNewline: false,
        });
        content = stdout;
      }
      return isBinaryContent(content) ? null : countLines(content);
    } catch (error) {
      logger.debug("Line count unavailable", { path: filePath, error: describeError(error) });
      return null;
    }
  }

  async getBaseRef(mode: Mode): Promise<string | null> {
    switch (mode) {
      case "uncommitted":
        return "HEAD";
      case "since-last":
        return "HEAD~1";
      case "default":
        try {
          return await this.getMergeBase();
        } catch (error) {
          if (error instanceof MergeBaseNotFoundError) return null;
          throw error;
        }
    }
  }

  async getCommitInfo(ref: string): Promise<CommitInfo> {
    const output = await this.git(["log", "-1", `--format=${COMMIT_LOG_FORMAT}`, ref, "--"]);
    const info = parseCommitInfo(output);
    if (!info) {
      throw new GitCommandError(["log", "-1", ref], `Unexpected log output for ${ref}`);
    }
    return info;
  }

  async getComparisonInfo(mode: Mode): Promise<ComparisonInfo> {
    switch (mode) {
      case "uncommitted":
        return { base: await this.getCommitInfo("HEAD"), head: UNCOMMITTED };
      case "since-last":
        return {
          base: await this.getCommitInfo("HEAD~1"),
          head: await this.getCommitInfo("HEAD"),
        };
      case "default":
        return {
          base: await this.getCommitInfo(await this.getMergeBase()),
          head: await this.getCommitInfo("HEAD"),
        };
    }
  }
}
