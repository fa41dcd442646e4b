import type { Rgb } from "../color/rgb.js";
import type { TerminalColor } from "../color/color-degrader.js";

/** One code point of a source line with its mapped color. */
export interface SourceChar {
  char: string;
  color: Rgb;
}

/** Color of one display column after tab expansion. */
export interface ColorCell {
  color: Rgb;
  whitespace: boolean;
}

export interface RenderedCell {
  color: TerminalColor;
  glyph: string;
}

/** One output row. Empty for a blank source line. */
export type RenderedLine = ReadonlyArray<RenderedCell>;
