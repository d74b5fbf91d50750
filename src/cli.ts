import { Command, CommanderError, Option } from "commander";
import type { ChangeSource, Mode } from "./types.js";
import { DEFAULT_BASE_BRANCH, SORT_KEYS, resolveConfig } from "./config.js";
import type { CliOptions, RunConfig } from "./config.js";
import { ChangesError } from "./errors.js";
import {
  formatComparison,
  formatSummary,
  sortChanges,
  toFlat,
  toJson,
} from "./format.js";
import { logger } from "./logger.js";
import { buildTree, renderTree } from "./tree.js";
import { VERSION } from "./version.js";

export interface CliIO {
  cwd: string;
  env: Record<string, string | undefined>;
  stdout(text: string): void;
  stderr(text: string): void;
  openRepository(cwd: string, baseBranch: string): Promise<ChangeSource>;
}

export function createProgram(io: Pick<CliIO, "stdout" | "stderr">): Command {
  return new Command()
    .name("changes-tree")
    .description(
      "Display changed files with line counts in tree view.\n\n" +
        "By default, compares the current branch against main since divergence.",
    )
    .version(VERSION)
    .addOption(
      new Option("--since-last", "compare HEAD vs previous commit").conflicts("uncommitted"),
    )
    .option("--uncommitted", "show uncommitted changes (staged + unstaged)")
    .option("--base <branch>", "branch to take the merge base with", DEFAULT_BASE_BRANCH)
    .option("--flat", "flat list instead of tree view")
    .option("--json", "output as JSON")
    .addOption(new Option("--sort <key>", "sort order").choices(SORT_KEYS).default("name"))
    .option("--no-color", "disable colored output")
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });
}

async function loadComparison(source: ChangeSource, mode: Mode): Promise<string[]> {
  try {
    return formatComparison(await source.getComparisonInfo(mode));
  } catch (error) {
    logger.debug("Comparison info unavailable", {
      error: error instanceof Error ? error.message : String(error),
    });
    return [];
  }
}

async function execute(config: RunConfig, io: CliIO): Promise<void> {
  const source = await io.openRepository(io.cwd, config.baseBranch);
  const changes = await source.getChanges(config.mode);

  if (changes.length === 0) {
    io.stdout("No changes found.\n");
    return;
  }

  const sorted = sortChanges(changes, config.sort);

  if (config.layout === "json") {
    const report = toJson(sorted, config.mode, await source.getBaseRef(config.mode));
    io.stdout(`${JSON.stringify(report, null, 2)}\n`);
    return;
  }

  const comparison = await loadComparison(source, config.mode);

  const lines =
    config.layout === "flat"
      ? toFlat(sorted, config.useColor)
      : renderTree(buildTree(sorted), config.useColor);

  lines.push("", ...formatSummary(sorted));
  if (comparison.length > 0) {
    lines.push("", "Compare:", ...comparison.map((line) => `    ${line}`));
  }

  io.stdout(`${lines.join("\n")}\n`);
}

function reportError(error: unknown, io: CliIO): void {
  if (error instanceof ChangesError) {
    io.stderr(`${error.label}: ${error.message}\n`);
    if (error.tip) io.stderr(`${error.tip}\n`);
    return;
  }
  io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
}

/**
 * Parse arguments, print the changes, and return the process exit code.
 */
export async function run(argv: string[], io: CliIO): Promise<number> {
  const program = createProgram(io);
  try {
    program.parse(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }

  const config = resolveConfig(program.opts<CliOptions>(), io.env);
  try {
    await execute(config, io);
    return 0;
  } catch (error) {
    reportError(error, io);
    return 1;
  }
}
