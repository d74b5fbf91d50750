// Change records (produced by git.ts, enriched by repository.ts)
export interface FileChange {
  path: string;
  insertions: number; // 0 for binary
  deletions: number; // 0 for binary
  loc: number | null; // current line count, null when missing or unreadable
}

export type Mode = "default" | "since-last" | "uncommitted";
export type SortKey = "name" | "changes" | "path";
export type Layout = "tree" | "flat" | "json";

// Tree structures (used by tree.ts)
export interface TreeNode {
  name: string;
  isFile: boolean;
  insertions: number;
  deletions: number;
  loc: number | null;
  children: Map<string, TreeNode>;
}

export interface LineStats {
  loc: number | null;
  insertions: number;
  deletions: number;
}

export interface ColumnWidths {
  loc: number;
  insertions: number;
  deletions: number;
}

// Comparison footer
export interface CommitInfo {
  shortHash: string;
  message: string; // first line only
  date: string; // YYYY-MM-DD HH:MM:SS
}

export const UNCOMMITTED = "uncommitted";

export interface ComparisonInfo {
  base: CommitInfo | null;
  head: CommitInfo | typeof UNCOMMITTED;
}

// JSON output
export interface ChangesReport {
  mode: Mode;
  files: Array<{
    path: string;
    loc: number | null;
    insertions: number;
    deletions: number;
  }>;
  summary: {
    total_insertions: number;
    total_deletions: number;
    net: number;
    file_count: number;
  };
  base?: string;
}

/** What the CLI needs from a repository. */
export interface ChangeSource {
  getChanges(mode: Mode): Promise<FileChange[]>;
  getBaseRef(mode: Mode): Promise<string | null>;
  getComparisonInfo(mode: Mode): Promise<ComparisonInfo>;
}
