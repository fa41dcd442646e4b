import { describe, expect, test } from "vitest";
import {
  classifySource,
  loadClassifier,
  PlainClassifier,
} from "../src/utils/highlight/classifier.js";
import type { Token } from "../src/utils/highlight/syntax-class.js";
import {
  BrokenClassifier,
  language,
  ScriptedClassifier,
  StubClassifier,
} from "./helpers/stub-classifier.js";

const rust = language("rust");

function collect(tokens: Iterable<Token>): Array<[number, number, string]> {
  return [...tokens].map((t): [number, number, string] => [
    t.start,
    t.end,
    t.syntaxClass,
  ]);
}

describe("classifySource", () => {
  test("fills gaps with default tokens", () => {
    const source = "fn main() {}";
    expect(collect(classifySource(new StubClassifier(), source, rust))).toEqual([
      [0, 2, "keyword"],
      [2, 3, "default"],
      [3, 7, "function"],
      [7, 12, "default"],
    ]);
  });

  test("clamps overlapping and out-of-range tokens", () => {
    const classifier = new ScriptedClassifier([
      { start: 0, end: 4, syntaxClass: "keyword" },
      { start: 2, end: 6, syntaxClass: "string" },
      { start: 6, end: 99, syntaxClass: "comment" },
    ]);
    expect(collect(classifySource(classifier, "abcdefgh", rust))).toEqual([
      [0, 4, "keyword"],
      [4, 6, "string"],
      [6, 8, "comment"],
    ]);
  });

  test("covers the rest of the input when the classifier fails midway", () => {
    const classifier = new ScriptedClassifier(
      [{ start: 0, end: 3, syntaxClass: "comment" }],
      true,
    );
    expect(collect(classifySource(classifier, "// broken", rust))).toEqual([
      [0, 3, "comment"],
      [3, 9, "default"],
    ]);
  });

  test("falls back to one default token when nothing is produced", () => {
    expect(
      collect(classifySource(new BrokenClassifier(), "let x = 1;", rust)),
    ).toEqual([[0, 10, "default"]]);
  });

  test("yields nothing for empty input", () => {
    expect(collect(classifySource(new StubClassifier(), "", rust))).toEqual([]);
  });
});

describe("PlainClassifier", () => {
  test("classifies everything as default", () => {
    expect(collect(new PlainClassifier().classify("abc", rust))).toEqual([
      [0, 3, "default"],
    ]);
  });
});

describe("loadClassifier", () => {
  test("returns the classifier once its grammar loads", async () => {
    const classifier = new StubClassifier();
    await expect(loadClassifier(classifier, rust)).resolves.toBe(classifier);
    expect(classifier.loaded).toEqual(["rust"]);
  });

  test("falls back to plain classification when loading fails", async () => {
    const fallback = await loadClassifier(new BrokenClassifier(), rust);
    expect(fallback).toBeInstanceOf(PlainClassifier);
  });
});
