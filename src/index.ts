export { runMinimap, readInput, writeOutput } from "./app.js";
export {
  loadConfig,
  loadStoredConfig,
  resolveConfig,
  type AppConfig,
  type CliFlags,
  type StoredConfig,
} from "./config.js";
export { Minimap, sampleRows } from "./components/visual/index.js";
export { ColorMapper, type ThemeOverrides } from "./utils/color/color-mapper.js";
export {
  degradeColor,
  rgbToAnsi256,
  type TerminalColor,
} from "./utils/color/color-degrader.js";
export { parseHex, toHex, type Rgb } from "./utils/color/rgb.js";
export {
  detectTerminalCapability,
  type TerminalCapability,
} from "./utils/color/terminal-capability.js";
export {
  classifySource,
  PlainClassifier,
  type TokenClassifier,
} from "./utils/highlight/classifier.js";
export { ShikiClassifier } from "./utils/highlight/shiki-classifier.js";
export {
  normalizeScopes,
  SYNTAX_CLASSES,
  SYNTAX_CLASS_VERSION,
  type SyntaxClass,
  type Token,
} from "./utils/highlight/syntax-class.js";
export { resolveLanguage } from "./utils/language/language-resolver.js";
export {
  getLanguageTable,
  type Language,
} from "./utils/language/language-table.js";
export {
  ERROR_CODES,
  MinimapError,
  type ErrorCode,
} from "./utils/minimap-errors.js";
export { LineCompressor } from "./utils/render/line-compressor.js";
export { MinimapEmitter, groupCells } from "./utils/render/minimap-emitter.js";
export { MinimapPrinter, type PrinterOptions } from "./utils/render/printer.js";
export type { RenderedLine, RenderedCell } from "./utils/render/types.js";
