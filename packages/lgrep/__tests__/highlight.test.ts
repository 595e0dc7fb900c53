import { Chalk } from "chalk";
import { expect, test } from "vitest";
import { compileMatcher } from "../src/phases/compile.ts";
import { findMatchSpans, highlight } from "../src/phases/highlight.ts";

const chalk = new Chalk({ level: 1 });
const OPEN = "\u001b[1m\u001b[31m";
const CLOSE = "\u001b[39m\u001b[22m";

function stripAnsi(text: string): string {
  return text.replace(/\u001b\[\d+m/g, "");
}

test("highlight wraps every match in bold red", () => {
  const output = highlight("the cat sat", compileMatcher("at"), chalk);

  expect(output).toBe(`the c${OPEN}at${CLOSE} s${OPEN}at${CLOSE}`);
});

test("highlight keeps touching matches separate without extra text", () => {
  const output = highlight("abab", compileMatcher("ab"), chalk);

  expect(output).toBe(`${OPEN}ab${CLOSE}${OPEN}ab${CLOSE}`);
});

test("highlight preserves the original casing of case-insensitive matches", () => {
  const output = highlight("FOO bar", compileMatcher("foo", { ignoreCase: true }), chalk);

  expect(output).toBe(`${OPEN}FOO${CLOSE} bar`);
});

test("highlight returns the line unchanged when nothing matches", () => {
  expect(highlight("nothing here", compileMatcher("zzz"), chalk)).toBe("nothing here");
});

test("stripping highlight markers yields the original line", () => {
  const matcher = compileMatcher("o");
  for (const line of ["foo", "o", "bob", "xyz", "oooo", "a.o.b"]) {
    expect(stripAnsi(highlight(line, matcher, chalk))).toBe(line);
  }
});

test("highlight emits plain text at color level 0", () => {
  const plain = new Chalk({ level: 0 });

  expect(highlight("foo bar", compileMatcher("foo"), plain)).toBe("foo bar");
});

test("findMatchSpans skips zero-width matches", () => {
  expect(findMatchSpans("ab", compileMatcher(""))).toEqual([]);
  expect(findMatchSpans("a cat, a cat", compileMatcher("cat", { wholeWords: true }))).toEqual([
    { start: 2, end: 5 },
    { start: 9, end: 12 },
  ]);
});
