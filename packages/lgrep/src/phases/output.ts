import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { CompiledMatcher, LineRecord } from "../types.ts";
import { highlight } from "./highlight.ts";

export type FormatOutputOptions = {
  color?: boolean;
  chalkInstance?: ChalkInstance;
};

export type FormatMatchLineOptions = {
  showFileName: boolean;
  showLineNumbers: boolean;
  /** When set, matched spans in the line text are highlighted. */
  highlight?: {
    matcher: CompiledMatcher;
    chalkInstance: ChalkInstance;
  };
};

export function formatLinePrefix(
  record: Pick<LineRecord, "file" | "index">,
  showFileName: boolean,
  showLineNumbers: boolean,
): string {
  const lineNumber = record.index + 1;
  if (showFileName && showLineNumbers) {
    return `${record.file}:${lineNumber}:`;
  }
  if (showFileName) {
    return `${record.file}:`;
  }
  if (showLineNumbers) {
    return `${lineNumber}:`;
  }
  return "";
}

/** Renders one selected line in normal output mode. */
export function formatMatchLine(record: LineRecord, options: FormatMatchLineOptions): string {
  const prefix = formatLinePrefix(record, options.showFileName, options.showLineNumbers);
  const text = options.highlight
    ? highlight(record.text, options.highlight.matcher, options.highlight.chalkInstance)
    : record.text;
  return `${prefix}${text}`;
}

export function formatCount(file: string, count: number, showFileName: boolean): string {
  return showFileName ? `${file}:${count}` : `${count}`;
}

export function formatReadFailure(file: string, message: string): string {
  return `${file}: ${message}`;
}

export function buildChalk(options: FormatOutputOptions): ChalkInstance {
  if (options.chalkInstance) {
    return options.chalkInstance;
  }

  const shouldColor = options.color ?? false;
  if (!shouldColor) {
    return new Chalk({ level: 0 });
  }

  const level = chalk.level > 0 ? chalk.level : 1;
  return new Chalk({ level });
}
