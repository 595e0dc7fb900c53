import { readFile } from "node:fs/promises";
import path from "node:path";
import type { ChalkInstance } from "chalk";
import { ReadError } from "../errors.ts";
import type { CompiledMatcher, FileTally, LineRecord, SearchSpec } from "../types.ts";
import { isMatch } from "./match.ts";
import { formatCount, formatMatchLine } from "./output.ts";

export type ScanContext = {
  spec: SearchSpec;
  matcher: CompiledMatcher;
  cwd: string;
  /** True when more than one file was given. */
  showFileName: boolean;
  /** Present only when normal-mode lines should be highlighted. */
  chalkInstance?: ChalkInstance;
  write: (line: string) => void;
};

const LINE_BREAK = /\r\n|\r|\n/;

export function splitLines(content: string): string[] {
  if (content.length === 0) {
    return [];
  }
  const lines = content.split(LINE_BREAK);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/** Reads a whole file as strict UTF-8, mapping every failure to a {@link ReadError}. */
export async function readTextFile(file: string, cwd: string): Promise<string> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(path.resolve(cwd, file));
  } catch (error) {
    throw new ReadError(file, describeReadFailure(error), error);
  }

  try {
    // A leading byte order mark stays part of the first line.
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch (error) {
    throw new ReadError(file, "stream did not contain valid UTF-8", error);
  }
}

/**
 * Scans one file and writes its rendered output through `context.write`.
 * In files-with-matches mode the scan stops at the first selected line.
 */
export async function scanFile(file: string, context: ScanContext): Promise<FileTally> {
  const content = await readTextFile(file, context.cwd);
  const { spec, matcher } = context;
  const output = spec.output;
  const tally: FileTally = { file, matchedLines: 0, linesScanned: 0 };
  const highlight =
    context.chalkInstance && !spec.invert
      ? { matcher, chalkInstance: context.chalkInstance }
      : undefined;

  const lines = splitLines(content);
  for (let index = 0; index < lines.length; index += 1) {
    const text = lines[index] ?? "";
    const record: LineRecord = {
      file,
      index,
      text,
      matched: isMatch(text, matcher, spec.invert),
    };
    tally.linesScanned += 1;
    if (!record.matched) {
      continue;
    }
    tally.matchedLines += 1;

    if (output.kind === "files-with-matches") {
      context.write(file);
      return tally;
    }
    if (output.kind === "normal") {
      context.write(
        formatMatchLine(record, {
          showFileName: context.showFileName,
          showLineNumbers: output.lineNumbers,
          highlight,
        }),
      );
    }
  }

  if (output.kind === "count") {
    context.write(formatCount(file, tally.matchedLines, context.showFileName));
  }
  return tally;
}

function describeReadFailure(error: unknown): string {
  if (isErrorWithCode(error)) {
    switch (error.code) {
      case "ENOENT":
        return "No such file or directory";
      case "EACCES":
      case "EPERM":
        return "Permission denied";
      case "EISDIR":
        return "Is a directory";
    }
  }
  return error instanceof Error ? error.message : String(error);
}

function isErrorWithCode(error: unknown): error is { code: string } {
  return typeof error === "object" && error !== null && "code" in error;
}
