import type { Language } from "../language/language-table.js";
import { log } from "../logger/log.js";
import {
  createMinimapError,
  describeCause,
  ERROR_CODES,
} from "../minimap-errors.js";
import type { Token } from "./syntax-class.js";

/**
 * Anything that can split source text into classified tokens.
 */
export interface TokenClassifier {
  /** Prepare the grammar for a language. May reject. */
  load(language: Language): Promise<void>;
  /**
   * Tokens in source order. Gaps and overlaps are tolerated; `classifySource`
   * repairs them.
   */
  classify(source: string, language: Language): Iterable<Token>;
}

/** Classifies everything as `default`. */
export class PlainClassifier implements TokenClassifier {
  async load(_language: Language): Promise<void> {
    // Nothing to load
  }

  *classify(source: string, _language: Language): Iterable<Token> {
    if (source.length > 0) {
      yield { start: 0, end: source.length, syntaxClass: "default" };
    }
  }
}

function logFailure(language: Language, cause: unknown, at: string): void {
  const error = createMinimapError(ERROR_CODES.CLASSIFIER_FAILURE, {
    source: at,
    language: language.id,
    cause,
  });
  log(`${error.message} (${at}): ${describeCause(cause)}`);
}

/**
 * Run a classifier and normalize its output into tokens that cover every
 * offset of `source` exactly once.
 *
 * Failures never escape: a classifier that throws before producing anything
 * yields one default token over the whole input, and one that throws midway
 * yields a default token over the rest.
 */
export function* classifySource(
  classifier: TokenClassifier,
  source: string,
  language: Language,
): Generator<Token> {
  let position = 0;
  try {
    for (const token of classifier.classify(source, language)) {
      const start = Math.max(token.start, position);
      const end = Math.min(token.end, source.length);
      if (end <= start) {
        continue;
      }
      if (start > position) {
        yield { start: position, end: start, syntaxClass: "default" };
      }
      yield { start, end, syntaxClass: token.syntaxClass };
      position = end;
    }
  } catch (error) {
    logFailure(language, error, `offset ${position}`);
  }
  if (position < source.length) {
    yield { start: position, end: source.length, syntaxClass: "default" };
  }
}

/**
 * `classifier.load` that falls back to plain classification on failure.
 */
export async function loadClassifier(
  classifier: TokenClassifier,
  language: Language,
): Promise<TokenClassifier> {
  try {
    await classifier.load(language);
    return classifier;
  } catch (error) {
    logFailure(language, error, "grammar load");
    return new PlainClassifier();
  }
}
