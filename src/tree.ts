import type { FileChange, LineStats, TreeNode } from "./types.js";
import { columnWidths, compareText, formatStatsAligned } from "./format.js";

const BRANCH = "├── ";
const CORNER = "└── ";
const PIPE_INDENT = "│   ";
const SPACE_INDENT = "    ";

function createNode(name: string): TreeNode {
  return { name, isFile: false, insertions: 0, deletions: 0, loc: null, children: new Map() };
}

/**
 * Group changes into a directory tree keyed by path segment.
 * Paths are expected to be clean and relative.
 */
export function buildTree(changes: FileChange[]): TreeNode {
  const root = createNode(".");

  for (const change of changes) {
    const segments = change.path.split("/");
    let node = root;

    segments.forEach((segment, i) => {
      let child = node.children.get(segment);
      if (!child) {
        child = createNode(segment);
        if (i === segments.length - 1) {
          child.isFile = true;
          child.insertions = change.insertions;
          child.deletions = change.deletions;
          child.loc = change.loc;
        }
        node.children.set(segment, child);
      }
      node = child;
    });
  }

  return root;
}

/** Directories first, then files, each group by name. */
export function sortedChildren(node: TreeNode): TreeNode[] {
  return [...node.children.values()].sort((a, b) => {
    if (a.isFile !== b.isFile) return a.isFile ? 1 : -1;
    return compareText(a.name, b.name);
  });
}

interface TreeLine {
  text: string;
  stats: LineStats | null; // null for directories
}

function collectLines(node: TreeNode, prefix: string, lines: TreeLine[]): void {
  const children = sortedChildren(node);

  children.forEach((child, i) => {
    const isLast = i === children.length - 1;
    const connector = isLast ? CORNER : BRANCH;

    if (child.isFile) {
      lines.push({
        text: `${prefix}${connector}${child.name}`,
        stats: { loc: child.loc, insertions: child.insertions, deletions: child.deletions },
      });
    } else {
      lines.push({ text: `${prefix}${connector}${child.name}/`, stats: null });
      collectLines(child, prefix + (isLast ? SPACE_INDENT : PIPE_INDENT), lines);
    }
  });
}

/**
 * Render the tree with box-drawing connectors. Stats columns line up across
 * the whole tree, whatever the nesting depth.
 */
export function renderTree(root: TreeNode, useColor: boolean): string[] {
  const lines: TreeLine[] = [];
  collectLines(root, "", lines);

  const statRows: LineStats[] = [];
  let textWidth = 0;
  for (const line of lines) {
    if (line.stats) {
      statRows.push(line.stats);
      textWidth = Math.max(textWidth, line.text.length);
    }
  }
  const widths = columnWidths(statRows);

  return lines.map((line) =>
    line.stats
      ? `${line.text.padEnd(textWidth)}  ${formatStatsAligned(line.stats, widths, useColor)}`
      : line.text,
  );
}
