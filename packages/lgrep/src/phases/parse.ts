import { ConfigError } from "../errors.ts";
import type { ColorMode, OutputMode, SearchSpec } from "../types.ts";

export type SearchSpecFlags = {
  "line-number"?: boolean;
  "ignore-case"?: boolean;
  "invert-match"?: boolean;
  count?: boolean;
  "files-with-matches"?: boolean;
  "word-regexp"?: boolean;
  color?: ColorMode;
};

/**
 * Validates the flag combination and folds it into a {@link SearchSpec}.
 * `--count`, `--files-with-matches` and `--line-number` are mutually exclusive.
 */
export function parseSearchSpec(pattern: string, flags: SearchSpecFlags = {}): SearchSpec {
  return {
    pattern,
    ignoreCase: flags["ignore-case"] ?? false,
    wholeWords: flags["word-regexp"] ?? false,
    invert: flags["invert-match"] ?? false,
    output: resolveOutputMode(flags),
    color: flags.color ?? "auto",
  };
}

function resolveOutputMode(flags: SearchSpecFlags): OutputMode {
  const lineNumbers = flags["line-number"] ?? false;
  const count = flags.count ?? false;
  const filesWithMatches = flags["files-with-matches"] ?? false;

  if (count && filesWithMatches) {
    throw new ConfigError("Cannot combine --count with --files-with-matches.");
  }
  if (count && lineNumbers) {
    throw new ConfigError("Cannot combine --count with --line-number.");
  }
  if (filesWithMatches && lineNumbers) {
    throw new ConfigError("Cannot combine --files-with-matches with --line-number.");
  }

  if (count) {
    return { kind: "count" };
  }
  if (filesWithMatches) {
    return { kind: "files-with-matches" };
  }
  return { kind: "normal", lineNumbers };
}

/** Decides once per run whether matched spans get highlighted. */
export function resolveColor(color: ColorMode, interactive: boolean): boolean {
  switch (color) {
    case "always":
      return true;
    case "never":
      return false;
    case "auto":
      return interactive;
  }
}

export function isInteractive(stream: object): boolean {
  return "isTTY" in stream && stream.isTTY === true;
}
