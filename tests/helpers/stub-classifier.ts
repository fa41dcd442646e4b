import type { TokenClassifier } from "../../src/utils/highlight/classifier.js";
import type {
  SyntaxClass,
  Token,
} from "../../src/utils/highlight/syntax-class.js";
import {
  getLanguageTable,
  type Language,
} from "../../src/utils/language/language-table.js";

const KEYWORDS = new Set(["fn", "let", "const", "return", "if", "else"]);

// comment | string | number | identifier
const PATTERN = /(\/\/[^\n]*)|("[^"\n]*")|(\d+)|([A-Za-z_]\w*)/g;

/**
 * Small deterministic tokenizer for tests. Leaves gaps for everything it does
 * not recognize so that gap filling is exercised too.
 */
export class StubClassifier implements TokenClassifier {
  readonly loaded: Array<string> = [];

  async load(language: Language): Promise<void> {
    this.loaded.push(language.id);
  }

  *classify(source: string, _language: Language): Iterable<Token> {
    for (const match of source.matchAll(PATTERN)) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      let syntaxClass: SyntaxClass = "default";
      if (match[1]) {
        syntaxClass = "comment";
      } else if (match[2]) {
        syntaxClass = "string";
      } else if (match[3]) {
        syntaxClass = "number";
      } else if (match[4] && KEYWORDS.has(match[4])) {
        syntaxClass = "keyword";
      } else if (source[end] === "(") {
        syntaxClass = "function";
      }
      yield { start, end, syntaxClass };
    }
  }
}

/** Fails on load, like a grammar that cannot be found. */
export class BrokenClassifier implements TokenClassifier {
  async load(language: Language): Promise<void> {
    throw new Error(`cannot load ${language.id}`);
  }

  *classify(_source: string, _language: Language): Iterable<Token> {
    throw new Error("not loaded");
  }
}

/** Yields the given tokens verbatim, then optionally throws. */
export class ScriptedClassifier implements TokenClassifier {
  constructor(
    private readonly tokens: ReadonlyArray<Token>,
    private readonly failAfter = false,
  ) {}

  async load(_language: Language): Promise<void> {}

  *classify(_source: string, _language: Language): Iterable<Token> {
    yield* this.tokens;
    if (this.failAfter) {
      throw new Error("tokenizer gave up");
    }
  }
}

/** Look up a bundled language, failing the test when it is missing. */
export function language(token: string): Language {
  const found = getLanguageTable().findByToken(token);
  if (!found) {
    throw new Error(`no language for ${token}`);
  }
  return found;
}
