/**
 * Closed set of syntax classes the color mapper understands. Every classifier
 * output is normalized into this set before it reaches the renderer.
 */
export const SYNTAX_CLASS_VERSION = 1;

export const SYNTAX_CLASSES = [
  "default",
  "comment",
  "string",
  "number",
  "constant",
  "keyword",
  "operator",
  "punctuation",
  "function",
  "type",
  "variable",
  "tag",
] as const;

export type SyntaxClass = (typeof SYNTAX_CLASSES)[number];

export interface Token {
  /** UTF-16 offset, inclusive */
  start: number;
  /** UTF-16 offset, exclusive */
  end: number;
  syntaxClass: SyntaxClass;
}

const SYNTAX_CLASS_NAMES: ReadonlySet<string> = new Set(SYNTAX_CLASSES);

export function isSyntaxClass(value: string): value is SyntaxClass {
  return SYNTAX_CLASS_NAMES.has(value);
}

// Checked in order; the first prefix that matches a scope wins.
const SCOPE_PREFIXES: Array<[prefix: string, syntaxClass: SyntaxClass]> = [
  ["constant.numeric", "number"],
  ["constant.character.escape", "string"],
  ["constant", "constant"],
  ["keyword.operator", "operator"],
  ["keyword", "keyword"],
  ["storage", "keyword"],
  ["entity.name.function", "function"],
  ["support.function", "function"],
  ["meta.function-call", "function"],
  ["entity.name.tag", "tag"],
  ["entity.name.type", "type"],
  ["entity.name.class", "type"],
  ["entity.other.inherited-class", "type"],
  ["support.type", "type"],
  ["support.class", "type"],
  ["entity.name", "variable"],
  ["variable", "variable"],
  ["support.variable", "variable"],
  ["punctuation", "punctuation"],
];

function matchesPrefix(scope: string, prefix: string): boolean {
  return scope === prefix || scope.startsWith(`${prefix}.`);
}

function classifyScope(scope: string): SyntaxClass | null {
  for (const [prefix, syntaxClass] of SCOPE_PREFIXES) {
    if (matchesPrefix(scope, prefix)) {
      return syntaxClass;
    }
  }
  return null;
}

/**
 * Map a TextMate scope stack (outermost first) to a syntax class.
 *
 * Comments and strings color everything nested inside them, including their
 * delimiters; otherwise the innermost scope with a known mapping decides.
 */
export function normalizeScopes(scopes: ReadonlyArray<string>): SyntaxClass {
  if (scopes.some((scope) => matchesPrefix(scope, "comment"))) {
    return "comment";
  }
  const innermostString = scopes.findLastIndex((scope) =>
    matchesPrefix(scope, "string"),
  );
  for (let i = scopes.length - 1; i > innermostString; i--) {
    const scope = scopes[i];
    if (scope === undefined) {
      continue;
    }
    const syntaxClass = classifyScope(scope);
    // Interpolated code inside a string keeps its own classes.
    if (syntaxClass && (innermostString < 0 || syntaxClass !== "punctuation")) {
      return syntaxClass;
    }
  }
  return innermostString >= 0 ? "string" : "default";
}
