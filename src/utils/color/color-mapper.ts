import type { SyntaxClass } from "../highlight/syntax-class.js";
import { parseHex, type Rgb } from "./rgb.js";

export type ColorTable = Record<SyntaxClass, Rgb>;

/** User overrides, one `#rrggbb` per class. */
export type ThemeOverrides = Partial<Record<SyntaxClass, string>>;

// Monokai Extended
const MONOKAI: Record<SyntaxClass, string> = {
  default: "#f8f8f2",
  comment: "#75715e",
  string: "#e6db74",
  number: "#ae81ff",
  constant: "#ae81ff",
  keyword: "#f92672",
  operator: "#f92672",
  punctuation: "#f8f8f2",
  function: "#a6e22e",
  type: "#66d9ef",
  variable: "#f8f8f2",
  tag: "#f92672",
};

const FALLBACK: Rgb = { r: 248, g: 248, b: 242 };

function buildTable(
  palette: Record<SyntaxClass, string>,
  overrides: ThemeOverrides,
): ColorTable {
  const resolve = (syntaxClass: SyntaxClass): Rgb => {
    const override = overrides[syntaxClass];
    return (
      (override ? parseHex(override) : null) ??
      parseHex(palette[syntaxClass]) ??
      FALLBACK
    );
  };
  return {
    default: resolve("default"),
    comment: resolve("comment"),
    string: resolve("string"),
    number: resolve("number"),
    constant: resolve("constant"),
    keyword: resolve("keyword"),
    operator: resolve("operator"),
    punctuation: resolve("punctuation"),
    function: resolve("function"),
    type: resolve("type"),
    variable: resolve("variable"),
    tag: resolve("tag"),
  };
}

/**
 * Maps a syntax class to its display color. Total: anything without an entry
 * gets the default color.
 */
export class ColorMapper {
  private readonly table: ColorTable;

  constructor(overrides: ThemeOverrides = {}) {
    this.table = buildTable(MONOKAI, overrides);
  }

  colorFor(syntaxClass: SyntaxClass): Rgb {
    return this.table[syntaxClass] ?? this.table.default;
  }
}
