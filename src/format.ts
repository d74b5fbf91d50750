import type {
  ChangesReport,
  ColumnWidths,
  CommitInfo,
  ComparisonInfo,
  FileChange,
  LineStats,
  Mode,
  SortKey,
} from "./types.js";
import { GREEN, RED, paint } from "./ansi.js";
import { netChange, totalChange } from "./git.js";

const MAX_MESSAGE_LENGTH = 50;

/** Code-unit ordering, independent of locale. */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function locText(loc: number | null): string {
  return loc === null ? "-" : String(loc);
}

/**
 * Widest formatted value per stats column, never less than 1.
 */
export function columnWidths(rows: LineStats[]): ColumnWidths {
  const widths: ColumnWidths = { loc: 1, insertions: 1, deletions: 1 };
  for (const row of rows) {
    widths.loc = Math.max(widths.loc, locText(row.loc).length);
    widths.insertions = Math.max(widths.insertions, String(row.insertions).length);
    widths.deletions = Math.max(widths.deletions, String(row.deletions).length);
  }
  return widths;
}

/**
 * Format "LoC  +X -Y" with each column right-aligned.
 * Padding is applied before coloring so escape codes never count toward width.
 */
export function formatStatsAligned(
  stats: LineStats,
  widths: ColumnWidths,
  useColor: boolean,
): string {
  const loc = locText(stats.loc).padStart(widths.loc);
  const ins = `+${String(stats.insertions).padStart(widths.insertions)}`;
  const dels = `-${String(stats.deletions).padStart(widths.deletions)}`;

  if (useColor) {
    return `${loc}  ${paint(GREEN, ins)} ${paint(RED, dels)}`;
  }
  return `${loc}  ${ins} ${dels}`;
}

/**
 * Flat list: path padded to the longest path, then the aligned stats.
 */
export function toFlat(changes: FileChange[], useColor: boolean): string[] {
  if (changes.length === 0) return [];

  const pathWidth = Math.max(...changes.map((c) => c.path.length));
  const widths = columnWidths(changes);

  return changes.map(
    (change) =>
      `${change.path.padEnd(pathWidth)}  ${formatStatsAligned(change, widths, useColor)}`,
  );
}

export function toJson(changes: FileChange[], mode: Mode, baseRef: string | null): ChangesReport {
  let totalInsertions = 0;
  let totalDeletions = 0;
  for (const change of changes) {
    totalInsertions += change.insertions;
    totalDeletions += change.deletions;
  }

  const report: ChangesReport = {
    mode,
    files: changes.map((c) => ({
      path: c.path,
      loc: c.loc,
      insertions: c.insertions,
      deletions: c.deletions,
    })),
    summary: {
      total_insertions: totalInsertions,
      total_deletions: totalDeletions,
      net: totalInsertions - totalDeletions,
      file_count: changes.length,
    },
  };

  if (baseRef) {
    report.base = baseRef;
  }

  return report;
}

export function formatSummary(changes: FileChange[]): string[] {
  const insertions = changes.reduce((sum, c) => sum + c.insertions, 0);
  const deletions = changes.reduce((sum, c) => sum + c.deletions, 0);
  const net = changes.reduce((sum, c) => sum + netChange(c), 0);
  const sign = net >= 0 ? "+" : "";

  return [`Total: +${insertions} -${deletions} (net: ${sign}${net})`, `Files: ${changes.length}`];
}

/** "YYYY-MM-DD HH:MM:SS abc123 commit message..." */
export function formatCommitInfo(commit: CommitInfo): string {
  let message = commit.message;
  if (message.length > MAX_MESSAGE_LENGTH) {
    message = `${message.slice(0, MAX_MESSAGE_LENGTH - 3)}...`;
  }
  return `${commit.date} ${commit.shortHash} ${message}`;
}

function fileName(path: string): string {
  return path.slice(path.lastIndexOf("/") + 1).toLowerCase();
}

export function sortChanges(changes: FileChange[], key: SortKey): FileChange[] {
  const sorted = [...changes];
  switch (key) {
    case "changes":
      return sorted.sort((a, b) => totalChange(b) - totalChange(a));
    case "path":
      return sorted.sort((a, b) => compareText(a.path, b.path));
    case "name":
      return sorted.sort((a, b) => compareText(fileName(a.path), fileName(b.path)));
  }
}

/** Descriptor lines for the "Compare:" footer, base first. */
export function formatComparison(comparison: ComparisonInfo): string[] {
  const lines: string[] = [];
  if (comparison.base) {
    lines.push(formatCommitInfo(comparison.base));
  }
  lines.push(typeof comparison.head === "string" ? comparison.head : formatCommitInfo(comparison.head));
  return lines;
}
