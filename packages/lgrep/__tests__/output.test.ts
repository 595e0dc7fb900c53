import { Chalk } from "chalk";
import { expect, test } from "vitest";
import { compileMatcher } from "../src/phases/compile.ts";
import {
  buildChalk,
  formatCount,
  formatLinePrefix,
  formatMatchLine,
  formatReadFailure,
} from "../src/phases/output.ts";

const record = { file: "notes.txt", index: 4, text: "foo bar", matched: true };

test("formatLinePrefix composes filename and 1-based line number", () => {
  expect(formatLinePrefix(record, true, true)).toBe("notes.txt:5:");
  expect(formatLinePrefix(record, true, false)).toBe("notes.txt:");
  expect(formatLinePrefix(record, false, true)).toBe("5:");
  expect(formatLinePrefix(record, false, false)).toBe("");
});

test("formatMatchLine prefixes the line text", () => {
  expect(formatMatchLine(record, { showFileName: true, showLineNumbers: true })).toBe(
    "notes.txt:5:foo bar",
  );
  expect(formatMatchLine(record, { showFileName: false, showLineNumbers: false })).toBe(
    "foo bar",
  );
});

test("formatMatchLine highlights only the line text", () => {
  const output = formatMatchLine(record, {
    showFileName: false,
    showLineNumbers: true,
    highlight: { matcher: compileMatcher("bar"), chalkInstance: new Chalk({ level: 1 }) },
  });

  expect(output).toBe("5:foo \u001b[1m\u001b[31mbar\u001b[39m\u001b[22m");
});

test("formatCount prints the filename only for multi-file runs", () => {
  expect(formatCount("a.txt", 2, false)).toBe("2");
  expect(formatCount("a.txt", 0, true)).toBe("a.txt:0");
});

test("formatReadFailure joins file and reason", () => {
  expect(formatReadFailure("missing.txt", "No such file or directory")).toBe(
    "missing.txt: No such file or directory",
  );
});

test("buildChalk disables color unless requested", () => {
  expect(buildChalk({}).level).toBe(0);
  expect(buildChalk({ color: false }).level).toBe(0);
  expect(buildChalk({ color: true }).level).toBeGreaterThan(0);

  const custom = new Chalk({ level: 2 });
  expect(buildChalk({ chalkInstance: custom })).toBe(custom);
});
