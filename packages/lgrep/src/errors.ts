/** Base class for every error raised by lgrep itself. */
export class LgrepError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid or conflicting flag combination. Fatal for the whole run. */
export class ConfigError extends LgrepError {}

/** The pattern could not be turned into a matcher. Fatal for the whole run. */
export class CompileError extends LgrepError {
  readonly pattern: string;

  constructor(pattern: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Unable to compile pattern ${JSON.stringify(pattern)}: ${reason}`, { cause });
    this.pattern = pattern;
  }
}

/** One file could not be read or decoded. The run continues with the next file. */
export class ReadError extends LgrepError {
  readonly file: string;

  constructor(file: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.file = file;
  }
}
