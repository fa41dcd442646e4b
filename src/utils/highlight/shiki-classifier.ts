import {
  bundledLanguages,
  createHighlighter,
  type BundledLanguage,
  type Highlighter,
} from "shiki";
import type { Language } from "../language/language-table.js";
import { PLAIN_TEXT_ID } from "../language/language-table.js";
import { log } from "../logger/log.js";
import type { TokenClassifier } from "./classifier.js";
import { normalizeScopes, type Token } from "./syntax-class.js";

// Only needed to satisfy the tokenizer; colors come from the ColorMapper.
const SHIKI_THEME = "monokai";

function isBundledLanguage(id: string): id is BundledLanguage {
  return Object.hasOwn(bundledLanguages, id);
}

/**
 * TextMate-grammar classifier backed by Shiki. Grammars are loaded on demand
 * and scopes are normalized into syntax classes.
 */
export class ShikiClassifier implements TokenClassifier {
  private highlighterPromise: Promise<Highlighter> | null = null;
  private highlighter: Highlighter | null = null;
  private readonly loaded = new Set<BundledLanguage>();

  async load(language: Language): Promise<void> {
    const lang = language.id;
    if (lang === PLAIN_TEXT_ID) {
      return;
    }
    if (!isBundledLanguage(lang)) {
      throw new Error(`No grammar for language "${lang}"`);
    }
    if (this.loaded.has(lang)) {
      return;
    }
    if (!this.highlighterPromise) {
      this.highlighterPromise = createHighlighter({
        themes: [SHIKI_THEME],
        langs: [],
      });
    }
    const highlighter = await this.highlighterPromise;
    await highlighter.loadLanguage(lang);
    this.highlighter = highlighter;
    this.loaded.add(lang);
    log(`Loaded grammar ${lang}`);
  }

  *classify(source: string, language: Language): Iterable<Token> {
    const lang = language.id;
    if (lang === PLAIN_TEXT_ID) {
      return;
    }
    if (!isBundledLanguage(lang) || !this.loaded.has(lang) || !this.highlighter) {
      throw new Error(`Grammar for "${lang}" is not loaded`);
    }
    const lines = this.highlighter.codeToTokensBase(source, {
      lang,
      theme: SHIKI_THEME,
      includeExplanation: true,
    });
    for (const line of lines) {
      for (const token of line) {
        if (!token.explanation) {
          yield {
            start: token.offset,
            end: token.offset + token.content.length,
            syntaxClass: "default",
          };
          continue;
        }
        let offset = token.offset;
        for (const part of token.explanation) {
          const end = offset + part.content.length;
          yield {
            start: offset,
            end,
            syntaxClass: normalizeScopes(part.scopes.map((s) => s.scopeName)),
          };
          offset = end;
        }
      }
    }
  }
}
