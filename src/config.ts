import type { Layout, Mode, SortKey } from "./types.js";

export const SORT_KEYS: readonly SortKey[] = ["name", "changes", "path"];
export const DEFAULT_BASE_BRANCH = "main";

/** Options as commander hands them over. */
export type CliOptions = {
  sinceLast?: boolean;
  uncommitted?: boolean;
  base?: string;
  flat?: boolean;
  json?: boolean;
  sort?: string;
  color?: boolean; // false for --no-color
};

export interface RunConfig {
  mode: Mode;
  layout: Layout;
  sort: SortKey;
  baseBranch: string;
  useColor: boolean;
}

function isSortKey(value: string | undefined): value is SortKey {
  return SORT_KEYS.some((key) => key === value);
}

/**
 * Resolve CLI options and the environment into one config.
 * NO_COLOR is read here and nowhere else.
 */
export function resolveConfig(
  options: CliOptions,
  env: Record<string, string | undefined>,
): RunConfig {
  let mode: Mode = "default";
  if (options.sinceLast) {
    mode = "since-last";
  } else if (options.uncommitted) {
    mode = "uncommitted";
  }

  let layout: Layout = "tree";
  if (options.json) {
    layout = "json";
  } else if (options.flat) {
    layout = "flat";
  }

  const noColorEnv = env.NO_COLOR !== undefined && env.NO_COLOR !== "";

  return {
    mode,
    layout,
    sort: isSortKey(options.sort) ? options.sort : "name",
    baseBranch: options.base || DEFAULT_BASE_BRANCH,
    useColor: options.color !== false && !options.json && !noColorEnv,
  };
}
