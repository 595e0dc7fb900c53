import { expect, test } from "vitest";
import { compileMatcher } from "../src/phases/compile.ts";
import { isMatch } from "../src/phases/match.ts";

const lines = ["foo bar", "baz", "foobar", "", "FOO", "a foo-b", "bar foo"];

test("isMatch is true exactly when the line contains the pattern", () => {
  const matcher = compileMatcher("foo");

  for (const line of lines) {
    expect(isMatch(line, matcher, false)).toBe(line.includes("foo"));
  }
});

test("isMatch with ignoreCase equals a lowercase comparison", () => {
  const insensitive = compileMatcher("FoO", { ignoreCase: true });
  const lowered = compileMatcher("foo");

  for (const line of lines) {
    expect(isMatch(line, insensitive, false)).toBe(isMatch(line.toLowerCase(), lowered, false));
  }
});

test("ignoreCase folds non-ASCII letters", () => {
  const matcher = compileMatcher("ÉTÉ", { ignoreCase: true });

  expect(isMatch("un été chaud", matcher, false)).toBe(true);
});

test("invert negates the base decision", () => {
  for (const options of [{}, { ignoreCase: true }, { wholeWords: true }]) {
    const matcher = compileMatcher("foo", options);
    for (const line of lines) {
      expect(isMatch(line, matcher, true)).toBe(!isMatch(line, matcher, false));
    }
  }
});

test("an empty line never matches and always satisfies invert", () => {
  const matcher = compileMatcher("foo");

  expect(isMatch("", matcher, false)).toBe(false);
  expect(isMatch("", matcher, true)).toBe(true);
});

test("whole words treat underscores and digits as word characters", () => {
  const matcher = compileMatcher("cat", { wholeWords: true });

  expect(isMatch("cat_food", matcher, false)).toBe(false);
  expect(isMatch("cat9", matcher, false)).toBe(false);
  expect(isMatch("(cat)", matcher, false)).toBe(true);
  expect(isMatch("cat", matcher, false)).toBe(true);
});

test("repeated checks against the shared matcher give the same answer", () => {
  const matcher = compileMatcher("foo");

  expect(isMatch("foo foo", matcher, false)).toBe(true);
  expect(isMatch("foo foo", matcher, false)).toBe(true);
  expect(isMatch("xfoo", matcher, false)).toBe(true);
});

test("an empty pattern matches every line", () => {
  const matcher = compileMatcher("");

  expect(isMatch("", matcher, false)).toBe(true);
  expect(isMatch("anything", matcher, false)).toBe(true);
});
