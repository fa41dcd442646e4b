import { describe, expect, test } from "vitest";
import {
  isSyntaxClass,
  normalizeScopes,
} from "../src/utils/highlight/syntax-class.js";

describe("normalizeScopes", () => {
  test("maps common TextMate scopes", () => {
    expect(normalizeScopes(["source.rust", "keyword.other.fn.rust"])).toBe(
      "keyword",
    );
    expect(normalizeScopes(["source.js", "storage.type.js"])).toBe("keyword");
    expect(
      normalizeScopes(["source.rust", "meta.function.rust", "entity.name.function.rust"]),
    ).toBe("function");
    expect(normalizeScopes(["source.c", "constant.numeric.decimal.c"])).toBe(
      "number",
    );
    expect(normalizeScopes(["source.ts", "keyword.operator.assignment.ts"])).toBe(
      "operator",
    );
    expect(normalizeScopes(["source.ts", "entity.name.type.interface.ts"])).toBe(
      "type",
    );
  });

  test("comment scopes anywhere in the stack win", () => {
    expect(
      normalizeScopes([
        "source.js",
        "comment.line.double-slash.js",
        "punctuation.definition.comment.js",
      ]),
    ).toBe("comment");
  });

  test("string delimiters and escapes count as string", () => {
    expect(
      normalizeScopes([
        "source.js",
        "string.quoted.double.js",
        "punctuation.definition.string.begin.js",
      ]),
    ).toBe("string");
    expect(
      normalizeScopes([
        "source.js",
        "string.quoted.double.js",
        "constant.character.escape.js",
      ]),
    ).toBe("string");
  });

  test("code interpolated into a string keeps its class", () => {
    expect(
      normalizeScopes([
        "source.js",
        "string.template.js",
        "meta.template.expression.js",
        "variable.other.readwrite.js",
      ]),
    ).toBe("variable");
  });

  test("only matches whole scope segments", () => {
    expect(normalizeScopes(["source.x", "keywords.custom"])).toBe("default");
  });

  test("unknown scopes map to default", () => {
    expect(normalizeScopes(["source.js", "meta.block.js"])).toBe("default");
    expect(normalizeScopes([])).toBe("default");
  });
});

describe("isSyntaxClass", () => {
  test("accepts members of the closed set only", () => {
    expect(isSyntaxClass("keyword")).toBe(true);
    expect(isSyntaxClass("markup.heading")).toBe(false);
  });
});
