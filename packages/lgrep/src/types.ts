import type { ChalkInstance } from "chalk";

/** How each selected line is rendered. Line numbers only exist in normal output. */
export type OutputMode =
  | { kind: "normal"; lineNumbers: boolean }
  | { kind: "count" }
  | { kind: "files-with-matches" };

/** Highlight policy. `auto` highlights only when stdout is a terminal. */
export type ColorMode = "auto" | "always" | "never";

export const COLOR_MODES: readonly ColorMode[] = ["auto", "always", "never"];

/** Validated, immutable description of one search run. */
export type SearchSpec = {
  /** Literal search text. Never interpreted as a regular expression. */
  readonly pattern: string;
  readonly ignoreCase: boolean;
  readonly wholeWords: boolean;
  /** Selects lines that do not match. */
  readonly invert: boolean;
  readonly output: OutputMode;
  readonly color: ColorMode;
};

/** Matcher compiled once per run and shared by every file and line. */
export type CompiledMatcher = {
  /** Source of the underlying expression (escaped literal, optionally `\b`-wrapped). */
  readonly source: string;
  readonly flags: string;
  readonly regex: RegExp;
};

/** One scanned line. Lives only until it is rendered. */
export type LineRecord = {
  file: string;
  /** Zero-based line index. */
  index: number;
  text: string;
  matched: boolean;
};

/** Per-file running totals. */
export type FileTally = {
  file: string;
  /** Number of selected lines (inverted runs count non-matching lines). */
  matchedLines: number;
  /** Number of lines evaluated before the scan finished or short-circuited. */
  linesScanned: number;
};

/** Runtime options for {@link searchFiles}. */
export type LgrepOptions = {
  /** Directory used to resolve relative file paths (defaults to `process.cwd()`). */
  cwd?: string;
  /** Wraps matched spans in bold red (defaults to `false`). */
  highlight?: boolean;
  /** Chalk used for highlighting; when given, its level replaces `highlight`. */
  chalkInstance?: ChalkInstance;
  /** Receives every rendered output line, without the trailing newline. */
  write?: (line: string) => void;
  /** Receives per-file read failures as `<file>: <reason>`. */
  reportError?: (line: string) => void;
  /** Perf logging level (`1` summary, `2` summary + per-file timings). */
  verbose?: number;
  /** Logger sink used by verbose tracing. */
  logger?: (line: string) => void;
};

/** A file that could not be read. */
export type LgrepFailure = {
  file: string;
  message: string;
};

/** Summary returned by {@link searchFiles}. */
export type LgrepResult = {
  /** Pattern text the run searched for. */
  pattern: string;
  /** Files read successfully. */
  filesScanned: number;
  /** Files with at least one selected line. */
  filesMatched: number;
  /** Files that failed to read. */
  filesFailed: number;
  /** Selected lines across all files. */
  totalMatchedLines: number;
  /** End-to-end run time in milliseconds. */
  elapsedMs: number;
  failures: LgrepFailure[];
};
