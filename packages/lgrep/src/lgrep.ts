import path from "node:path";
import { formatMs, nowNs, nsToMs } from "./common/trace.ts";
import { ReadError } from "./errors.ts";
import { compileMatcher } from "./phases/compile.ts";
import { buildChalk, formatReadFailure } from "./phases/output.ts";
import { scanFile, type ScanContext } from "./phases/scan.ts";
import type { LgrepFailure, LgrepOptions, LgrepResult, SearchSpec } from "./types.ts";

/**
 * Searches `files` in order for `spec.pattern`, streaming rendered lines to
 * `options.write`.
 *
 * A file that cannot be read is reported through `options.reportError` and
 * skipped; the remaining files are still searched. A pattern that fails to
 * compile throws before any file is opened.
 */
export async function searchFiles(
  spec: SearchSpec,
  files: readonly string[],
  options: LgrepOptions = {},
): Promise<LgrepResult> {
  const startedAt = Date.now();
  const verbose = options.verbose ?? 0;
  const log = options.logger ?? (() => {});
  const write = options.write ?? (() => {});
  const reportError = options.reportError ?? (() => {});

  const compileStarted = verbose > 0 ? nowNs() : 0n;
  const matcher = compileMatcher(spec.pattern, {
    ignoreCase: spec.ignoreCase,
    wholeWords: spec.wholeWords,
  });
  if (verbose > 0) {
    log(
      `[lgrep] compileMatcher ${formatMs(nsToMs(nowNs() - compileStarted))} source=${matcher.source} flags=${matcher.flags}`,
    );
  }

  const chalkInstance = buildChalk({
    color: options.highlight,
    chalkInstance: options.chalkInstance,
  });
  const context: ScanContext = {
    spec,
    matcher,
    cwd: path.resolve(options.cwd ?? process.cwd()),
    showFileName: files.length > 1,
    chalkInstance:
      chalkInstance.level > 0 && spec.output.kind === "normal" ? chalkInstance : undefined,
    write,
  };

  let filesScanned = 0;
  let filesMatched = 0;
  let totalMatchedLines = 0;
  const failures: LgrepFailure[] = [];

  for (const file of files) {
    const fileStarted = verbose >= 2 ? nowNs() : 0n;
    try {
      const tally = await scanFile(file, context);
      filesScanned += 1;
      totalMatchedLines += tally.matchedLines;
      if (tally.matchedLines > 0) {
        filesMatched += 1;
      }
      if (verbose >= 2) {
        log(
          `[lgrep] scanFile ${formatMs(nsToMs(nowNs() - fileStarted))} file=${file} lines=${tally.linesScanned} matched=${tally.matchedLines}`,
        );
      }
    } catch (error) {
      if (!(error instanceof ReadError)) {
        throw error;
      }
      failures.push({ file: error.file, message: error.message });
      reportError(formatReadFailure(error.file, error.message));
    }
  }

  if (verbose > 0) {
    log(
      `[lgrep] summary filesScanned=${filesScanned} filesMatched=${filesMatched} filesFailed=${failures.length} matchedLines=${totalMatchedLines}`,
    );
  }

  return {
    pattern: spec.pattern,
    filesScanned,
    filesMatched,
    filesFailed: failures.length,
    totalMatchedLines,
    elapsedMs: Date.now() - startedAt,
    failures,
  };
}

/** Alias of {@link searchFiles}. */
export const lgrep = searchFiles;
