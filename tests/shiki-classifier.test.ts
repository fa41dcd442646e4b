import { describe, expect, test } from "vitest";
import { classifySource } from "../src/utils/highlight/classifier.js";
import { ShikiClassifier } from "../src/utils/highlight/shiki-classifier.js";
import type { SyntaxClass } from "../src/utils/highlight/syntax-class.js";
import { language } from "./helpers/stub-classifier.js";

/** Syntax class of every UTF-16 offset. */
function classesByOffset(
  source: string,
  classifier: ShikiClassifier,
  lang: string,
): Array<SyntaxClass> {
  const classes: Array<SyntaxClass> = [];
  for (const token of classifySource(classifier, source, language(lang))) {
    for (let i = token.start; i < token.end; i++) {
      classes[i] = token.syntaxClass;
    }
  }
  return classes;
}

function classOf(
  classes: Array<SyntaxClass>,
  source: string,
  text: string,
): Array<SyntaxClass | undefined> {
  const start = source.indexOf(text);
  return classes.slice(start, start + text.length);
}

describe("ShikiClassifier", () => {
  const classifier = new ShikiClassifier();

  test("classifies comments, strings and keywords", async () => {
    await classifier.load(language("javascript"));
    const source = '// greeting\nconst s = "hi";\n';
    const classes = classesByOffset(source, classifier, "javascript");

    expect(classes).toHaveLength(source.length);
    expect(new Set(classOf(classes, source, "// greeting"))).toEqual(
      new Set(["comment"]),
    );
    expect(new Set(classOf(classes, source, '"hi"'))).toEqual(
      new Set(["string"]),
    );
    expect(new Set(classOf(classes, source, "const"))).toEqual(
      new Set(["keyword"]),
    );
  });

  test("yields nothing for plain text", () => {
    expect([...classifier.classify("abc", language("plaintext"))]).toEqual([]);
  });

  test("refuses to classify before the grammar is loaded", () => {
    const fresh = new ShikiClassifier();
    expect(() => [...fresh.classify("x", language("rust"))]).toThrow(
      /not loaded/,
    );
  });

  test("rejects languages without a grammar", async () => {
    await expect(
      classifier.load({
        id: "no-such-grammar",
        name: "None",
        aliases: [],
        extensions: [],
        filenames: [],
        interpreters: [],
      }),
    ).rejects.toThrow(/No grammar/);
  });
});
