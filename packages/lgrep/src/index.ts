export { lgrep, searchFiles } from "./lgrep.ts";
export { app } from "./app.ts";
export { runSearchCommand, searchCommand } from "./command.ts";
export type { SearchCommandFlags, SearchCommandIo } from "./command.ts";
export { CompileError, ConfigError, LgrepError, ReadError } from "./errors.ts";
export { compileMatcher, escapeLiteral } from "./phases/compile.ts";
export type { CompileMatcherOptions } from "./phases/compile.ts";
export { isMatch } from "./phases/match.ts";
export { findMatchSpans, highlight } from "./phases/highlight.ts";
export type { MatchSpan } from "./phases/highlight.ts";
export {
  buildChalk,
  formatCount,
  formatLinePrefix,
  formatMatchLine,
  formatReadFailure,
} from "./phases/output.ts";
export { isInteractive, parseSearchSpec, resolveColor } from "./phases/parse.ts";
export type { SearchSpecFlags } from "./phases/parse.ts";
export { readTextFile, scanFile, splitLines } from "./phases/scan.ts";
export type { ScanContext } from "./phases/scan.ts";
export { COLOR_MODES } from "./types.ts";
export type {
  ColorMode,
  CompiledMatcher,
  FileTally,
  LgrepFailure,
  LgrepOptions,
  LgrepResult,
  LineRecord,
  OutputMode,
  SearchSpec,
} from "./types.ts";
export { LGREP_VERSION } from "./version.ts";
