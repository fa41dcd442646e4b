import { ColorMapper, type ThemeOverrides } from "../color/color-mapper.js";
import type { TerminalCapability } from "../color/terminal-capability.js";
import {
  classifySource,
  loadClassifier,
  PlainClassifier,
  type TokenClassifier,
} from "../highlight/classifier.js";
import { resolveLanguage } from "../language/language-resolver.js";
import {
  getLanguageTable,
  PLAIN_TEXT_ID,
  type Language,
  type LanguageTable,
} from "../language/language-table.js";
import { isLoggingEnabled, log } from "../logger/log.js";
import { ERROR_CODES, isMinimapError } from "../minimap-errors.js";
import { LineCompressor } from "./line-compressor.js";
import { segmentLines } from "./line-segmenter.js";
import { MinimapEmitter } from "./minimap-emitter.js";
import type { RenderedLine } from "./types.js";

export interface PrinterOptions {
  /** Explicit language; skips detection. */
  language?: string;
  /** Column limit, 0 for none */
  columns: number;
  tabs: number;
  capability: TerminalCapability;
  classifier: TokenClassifier;
  theme?: ThemeOverrides;
  glyph?: string;
  blankWhitespace?: boolean;
  languages?: LanguageTable;
}

/**
 * Runs the whole pipeline for one input at a time: language, tokens, colors,
 * columns, rows.
 */
export class MinimapPrinter {
  private readonly mapper: ColorMapper;
  private readonly compressor: LineCompressor;
  private readonly emitter: MinimapEmitter;
  private readonly languages: LanguageTable;

  constructor(private readonly options: PrinterOptions) {
    this.mapper = new ColorMapper(options.theme);
    this.compressor = new LineCompressor({
      tabWidth: options.tabs,
      maxColumns: options.columns,
    });
    this.emitter = new MinimapEmitter({
      capability: options.capability,
      glyph: options.glyph,
      blankWhitespace: options.blankWhitespace,
    });
    this.languages = options.languages ?? getLanguageTable();
  }

  /**
   * Language for an input, falling back to plain text when nothing identifies
   * it. An unknown explicit language still throws.
   */
  resolve(source: string, path?: string): Language {
    try {
      return resolveLanguage(
        { override: this.options.language, path, content: source },
        this.languages,
      );
    } catch (error) {
      if (isMinimapError(error, ERROR_CODES.UNDETERMINED_LANGUAGE)) {
        log(`${error.details.source}: no language detected, using plain text`);
        return this.languages.plainText;
      }
      throw error;
    }
  }

  async renderLines(
    source: string,
    path?: string,
  ): Promise<Array<RenderedLine>> {
    const language = this.resolve(source, path);
    const classifier =
      language.id === PLAIN_TEXT_ID
        ? new PlainClassifier()
        : await loadClassifier(this.options.classifier, language);
    log(`${path ?? "stdin"}: rendering as ${language.id}`);

    const lines: Array<RenderedLine> = [];
    const tokens = classifySource(classifier, source, language);
    const segments = segmentLines(source, tokens, this.mapper, {
      maxChars: this.options.columns,
    });
    for (const chars of segments) {
      lines.push(this.emitter.toRenderedLine(this.compressor.compress(chars)));
    }
    if (isLoggingEnabled()) {
      const cells = lines.reduce((sum, line) => sum + line.length, 0);
      log(`${path ?? "stdin"}: ${lines.length} rows, ${cells} cells`);
    }
    return lines;
  }

  /** Complete terminal output for one input, reset sequence included. */
  async render(source: string, path?: string): Promise<string> {
    const lines = await this.renderLines(source, path);
    if (lines.length === 0) {
      return "";
    }
    return [...this.emitter.emitRows(lines)].join("") + this.emitter.reset();
  }
}
