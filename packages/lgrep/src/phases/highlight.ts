import type { ChalkInstance } from "chalk";
import type { CompiledMatcher } from "../types.ts";

export type MatchSpan = {
  start: number;
  end: number;
};

/** Non-overlapping, non-empty match spans in left-to-right order. */
export function findMatchSpans(line: string, matcher: CompiledMatcher): MatchSpan[] {
  const spans: MatchSpan[] = [];
  for (const match of line.matchAll(matcher.regex)) {
    const text = match[0] ?? "";
    const start = match.index;
    if (start === undefined || text.length === 0) {
      continue;
    }
    spans.push({ start, end: start + text.length });
  }
  return spans;
}

export function highlight(
  line: string,
  matcher: CompiledMatcher,
  chalkInstance: ChalkInstance,
): string {
  const spans = findMatchSpans(line, matcher);
  if (spans.length === 0) {
    return line;
  }

  const parts: string[] = [];
  let cursor = 0;

  for (const span of spans) {
    if (span.start > cursor) {
      parts.push(line.slice(cursor, span.start));
    }
    parts.push(chalkInstance.bold.red(line.slice(span.start, span.end)));
    cursor = span.end;
  }

  if (cursor < line.length) {
    parts.push(line.slice(cursor));
  }

  return parts.join("");
}
