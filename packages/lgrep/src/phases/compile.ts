import { CompileError } from "../errors.ts";
import type { CompiledMatcher } from "../types.ts";

export type CompileMatcherOptions = {
  ignoreCase?: boolean;
  wholeWords?: boolean;
};

const REGEX_SYNTAX = /[\\^$.*+?()[\]{}|/]/g;

export function escapeLiteral(text: string): string {
  return text.replace(REGEX_SYNTAX, "\\$&");
}

/**
 * Builds the single matcher used for every line of a run.
 *
 * The pattern is always escaped, so plain searches are substring searches.
 * Whole-word searches wrap it in `\b` assertions, where word characters are
 * `[A-Za-z0-9_]`.
 */
export function compileMatcher(
  pattern: string,
  options: CompileMatcherOptions = {},
): CompiledMatcher {
  const escaped = escapeLiteral(pattern);
  const source = options.wholeWords ? `\\b${escaped}\\b` : escaped;
  const flags = options.ignoreCase ? "giu" : "gu";

  let regex: RegExp;
  try {
    regex = new RegExp(source, flags);
  } catch (error) {
    throw new CompileError(pattern, error);
  }

  return { source, flags, regex };
}
