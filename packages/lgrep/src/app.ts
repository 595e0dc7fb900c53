import { buildApplication, text_en } from "@stricli/core";
import { searchCommand } from "./command.ts";
import { LgrepError } from "./errors.ts";

// Own errors are reported by kind; anything else is an unexpected failure.
function formatCommandException(exc: unknown): string {
  if (exc instanceof LgrepError) {
    return `${exc.name}: ${exc.message}`;
  }
  if (exc instanceof Error) {
    return `Application error: ${exc.message}`;
  }
  return `Application error: ${String(exc)}`;
}

const text = {
  ...text_en,
  exceptionWhileParsingArguments: (exc: unknown) =>
    `Unable to parse arguments, ${exc instanceof Error ? exc.message : String(exc)}`,
  exceptionWhileRunningCommand: (exc: unknown) => formatCommandException(exc),
};

export const app = buildApplication(searchCommand, {
  name: "lgrep",
  scanner: {
    caseStyle: "original",
    // `lgrep -- -x file` searches for the literal `-x`.
    allowArgumentEscapeSequence: true,
  },
  documentation: {
    caseStyle: "original",
  },
  localization: {
    defaultLocale: "en",
    loadText: () => text,
  },
});
