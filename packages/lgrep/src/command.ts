import { buildCommand, type CommandContext } from "@stricli/core";
import { ConfigError } from "./errors.ts";
import { searchFiles } from "./lgrep.ts";
import {
  isInteractive,
  parseSearchSpec,
  resolveColor,
  type SearchSpecFlags,
} from "./phases/parse.ts";
import { COLOR_MODES, type LgrepResult } from "./types.ts";
import { LGREP_VERSION } from "./version.ts";

export type SearchCommandFlags = SearchSpecFlags & {
  version?: boolean;
  cwd?: string;
  verbose?: number;
};

export type SearchCommandIo = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  /** Whether stdout is an interactive terminal; consulted only for `--color auto`. */
  interactive: boolean;
};

/**
 * Validates flags, then searches `files` for `pattern`, writing one line per
 * result to `io.stdout` and one line per unreadable file to `io.stderr`.
 */
export async function runSearchCommand(
  pattern: string,
  files: readonly string[],
  flags: SearchCommandFlags,
  io: SearchCommandIo,
): Promise<LgrepResult> {
  const spec = parseSearchSpec(pattern, flags);
  const verbose = flags.verbose ?? 0;

  return searchFiles(spec, files, {
    cwd: flags.cwd,
    highlight: resolveColor(spec.color, io.interactive),
    write: io.stdout,
    reportError: io.stderr,
    verbose,
    logger: verbose > 0 ? io.stderr : undefined,
  });
}

export const searchCommand = buildCommand({
  async func(this: CommandContext, flags: SearchCommandFlags, ...inputs: string[]) {
    if (flags.version ?? false) {
      this.process.stdout.write(`${LGREP_VERSION}\n`);
      return;
    }

    const [pattern, ...files] = inputs;
    if (pattern === undefined) {
      throw new ConfigError("Missing required argument: pattern.");
    }

    const { stdout, stderr } = this.process;
    await runSearchCommand(pattern, files, flags, {
      stdout: (line) => stdout.write(`${line}\n`),
      stderr: (line) => stderr.write(`${line}\n`),
      interactive: isInteractive(stdout),
    });
  },
  parameters: {
    flags: {
      "line-number": {
        kind: "boolean" as const,
        optional: true,
        withNegated: false,
        brief: "Prefix each output line with its 1-based line number",
      },
      "ignore-case": {
        kind: "boolean" as const,
        optional: true,
        withNegated: false,
        brief: "Ignore case distinctions in the pattern and the input",
      },
      "invert-match": {
        kind: "boolean" as const,
        optional: true,
        withNegated: false,
        brief: "Select non-matching lines",
      },
      count: {
        kind: "boolean" as const,
        optional: true,
        withNegated: false,
        brief: "Print only a count of selected lines per file",
      },
      "files-with-matches": {
        kind: "boolean" as const,
        optional: true,
        withNegated: false,
        brief: "Print only the names of files with selected lines",
      },
      "word-regexp": {
        kind: "boolean" as const,
        optional: true,
        withNegated: false,
        brief: "Match only whole words",
      },
      color: {
        kind: "enum" as const,
        values: COLOR_MODES,
        optional: true,
        brief: "Highlight matches: auto (terminal only), always or never",
      },
      version: {
        kind: "boolean" as const,
        optional: true,
        withNegated: false,
        brief: "Print the version and exit",
      },
      cwd: {
        kind: "parsed" as const,
        optional: true,
        brief: "Working directory for resolving file paths",
        placeholder: "path",
        parse: (input: string) => input,
      },
      verbose: {
        kind: "parsed" as const,
        optional: true,
        brief: "Print perf tracing to stderr (1=summary, 2=includes per-file timings)",
        placeholder: "level",
        parse: (input: string) => {
          const value = Number(input);
          if (!Number.isFinite(value) || value < 0) {
            throw new Error("--verbose must be a non-negative number");
          }
          return Math.floor(value);
        },
      },
    },
    aliases: {
      n: "line-number",
      i: "ignore-case",
      v: "invert-match",
      c: "count",
      l: "files-with-matches",
      w: "word-regexp",
    },
    positional: {
      kind: "array" as const,
      parameter: {
        brief: "Literal pattern followed by the files to search",
        placeholder: "pattern|file",
        parse: (input: string) => input,
      },
    },
  },
  docs: {
    brief: "Print lines that contain a literal pattern",
  },
});
