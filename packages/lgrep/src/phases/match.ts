import type { CompiledMatcher } from "../types.ts";

// `search` ignores and restores `lastIndex`, so the shared global regex stays stateless.
export function isMatch(line: string, matcher: CompiledMatcher, invert: boolean): boolean {
  const found = line.search(matcher.regex) !== -1;
  return invert ? !found : found;
}
