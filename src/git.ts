import type { CommitInfo, FileChange } from "./types.js";
import { logger } from "./logger.js";

const RENAME_ARROW = " => ";

/**
 * Resolve a numstat rename to the side after the arrow.
 * Braces go first, so "{old => new}/file.txt" reads "old => new/file.txt"
 * and yields "new/file.txt"; "old.txt => new.txt" yields "new.txt".
 */
export function expandRename(filePath: string): string {
  if (!filePath.includes(RENAME_ARROW)) return filePath;

  const unbraced = filePath.replace(/[{}]/g, "");
  const sides = unbraced.split(RENAME_ARROW);
  return sides.length > 1 ? sides[1] : unbraced;
}

function parseCount(field: string): number {
  // Binary files report "-"
  if (field === "-") return 0;
  const value = parseInt(field, 10);
  return Number.isNaN(value) || value < 0 ? 0 : value;
}

/**
 * Parse `git diff --numstat` output.
 * Lines: "added\tremoved\tpath"
 */
export function parseNumstat(output: string): FileChange[] {
  if (!output.trim()) return [];

  const changes: FileChange[] = [];
  let unexpectedLines = 0;

  for (const line of output.split("\n")) {
    if (!line.trim()) continue;

    const parts = line.split("\t");
    if (parts.length < 3) {
      unexpectedLines++;
      continue;
    }
    const rawPath = parts.slice(2).join("\t"); // handle paths with tabs (rare)
    changes.push({
      path: expandRename(rawPath),
      insertions: parseCount(parts[0]),
      deletions: parseCount(parts[1]),
      loc: null,
    });
  }

  if (unexpectedLines > 0) {
    logger.debug("Skipped malformed numstat lines", { count: unexpectedLines });
  }

  return changes;
}

export function netChange(change: FileChange): number {
  return change.insertions - change.deletions;
}

export function totalChange(change: FileChange): number {
  return change.insertions + change.deletions;
}

/** Newline count, plus one for a final unterminated line. */
export function countLines(content: string): number {
  if (content === "") return 0;
  let count = 0;
  for (let i = content.indexOf("\n"); i !== -1; i = content.indexOf("\n", i + 1)) {
    count++;
  }
  return content.endsWith("\n") ? count : count + 1;
}

export function isBinaryContent(content: string): boolean {
  return content.includes("\0");
}

export const COMMIT_LOG_FORMAT = "COMMIT%x00%H%x00%ci%x00%B";

/**
 * Parse `git log -1 --format=COMMIT%x00%H%x00%ci%x00%B` output.
 * %ci reads "2024-01-15 10:00:00 +0100"; only the local date and time are kept.
 */
export function parseCommitInfo(output: string): CommitInfo | null {
  if (!output.startsWith("COMMIT\0")) return null;

  const parts = output.split("\0");
  if (parts.length < 4) return null;
  const hash = parts[1];
  const date = parts[2];
  const body = parts.slice(3).join("\0");

  return {
    shortHash: hash.slice(0, 6),
    date: date.slice(0, 19),
    message: body.split("\n")[0].trim(),
  };
}
