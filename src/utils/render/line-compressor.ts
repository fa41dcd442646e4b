import type { ColorCell, SourceChar } from "./types.js";

export interface LineCompressorOptions {
  /** Tab stop width; 0 keeps a tab as a single column. */
  tabWidth: number;
  /** Column limit; 0 means unbounded. */
  maxColumns: number;
}

export const DEFAULT_TAB_WIDTH = 4;

const WHITESPACE = /^\s$/u;

/**
 * Turns one line of colored characters into display-column cells, expanding
 * tabs and cutting the line at the column limit. Every code point counts as
 * one column.
 */
export class LineCompressor {
  private readonly tabWidth: number;
  private readonly maxColumns: number;

  constructor({ tabWidth, maxColumns }: LineCompressorOptions) {
    this.tabWidth = tabWidth;
    this.maxColumns = maxColumns > 0 ? maxColumns : Infinity;
  }

  compress(chars: Iterable<SourceChar>): Array<ColorCell> {
    const cells: Array<ColorCell> = [];
    let column = 0;
    for (const { char, color } of chars) {
      if (column >= this.maxColumns) {
        break;
      }
      if (char === "\t" && this.tabWidth > 0) {
        // Tab cells keep the tab's own color so tab indentation shows up
        // like space indentation.
        const stop = column + this.tabWidth - (column % this.tabWidth);
        const end = Math.min(stop, this.maxColumns);
        for (; column < end; column++) {
          cells.push({ color, whitespace: true });
        }
      } else {
        cells.push({ color, whitespace: WHITESPACE.test(char) });
        column++;
      }
    }
    return cells;
  }
}
