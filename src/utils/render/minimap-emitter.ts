import {
  degradeColor,
  isSameColor,
  type TerminalColor,
} from "../color/color-degrader.js";
import type { TerminalCapability } from "../color/terminal-capability.js";
import type { ColorCell, RenderedLine } from "./types.js";

export const DEFAULT_GLYPH = "▀";

const BLANK = " ";
const ESC = "\u001B[";
const RESET = `${ESC}0m`;

export interface MinimapEmitterOptions {
  capability: TerminalCapability;
  glyph?: string;
  /** Print whitespace as uncolored blanks instead of glyphs. */
  blankWhitespace?: boolean;
}

/** Adjacent cells sharing glyph and color. */
export interface CellRun {
  color: TerminalColor;
  glyph: string;
  count: number;
}

/**
 * Merge adjacent cells that would look identical. Blank cells show no color,
 * so consecutive blanks merge regardless of their color.
 */
export function groupCells(line: RenderedLine): Array<CellRun> {
  const runs: Array<CellRun> = [];
  for (const cell of line) {
    const last = runs[runs.length - 1];
    if (
      last &&
      last.glyph === cell.glyph &&
      (cell.glyph === BLANK || isSameColor(last.color, cell.color))
    ) {
      last.count++;
    } else {
      runs.push({ color: cell.color, glyph: cell.glyph, count: 1 });
    }
  }
  return runs;
}

/** Foreground sequence for a color, or "" when it carries none. */
export function foregroundSequence(color: TerminalColor): string {
  switch (color.kind) {
    case "none":
      return "";
    case "ansi256":
      return `${ESC}38;5;${color.index}m`;
    case "rgb":
      return `${ESC}38;2;${color.r};${color.g};${color.b}m`;
  }
}

/**
 * Writes rendered lines as terminal rows. A color sequence is written only
 * where the color changes, including across rows; nothing closes a color
 * before `reset()`.
 */
export class MinimapEmitter {
  readonly capability: TerminalCapability;
  private readonly glyph: string;
  private readonly blankWhitespace: boolean;

  constructor({
    capability,
    glyph = DEFAULT_GLYPH,
    blankWhitespace = false,
  }: MinimapEmitterOptions) {
    this.capability = capability;
    this.glyph = glyph;
    this.blankWhitespace = blankWhitespace;
  }

  toRenderedLine(cells: ReadonlyArray<ColorCell>): RenderedLine {
    return cells.map((cell) => {
      const blank = cell.whitespace && !this.blankWhitespace;
      return {
        color: degradeColor(cell.color, this.capability),
        glyph: blank ? BLANK : this.glyph,
      };
    });
  }

  /** One row, starting with no color set. */
  emitLine(line: RenderedLine): string {
    return this.paintLine(line, null).text;
  }

  *emitRows(lines: Iterable<RenderedLine>): Generator<string> {
    let active: TerminalColor | null = null;
    for (const line of lines) {
      const painted = this.paintLine(line, active);
      active = painted.active;
      yield `${painted.text}\n`;
    }
  }

  /** Sequence to write after a file's last row. */
  reset(): string {
    return this.capability === "none" ? "" : RESET;
  }

  private paintLine(
    line: RenderedLine,
    active: TerminalColor | null,
  ): { text: string; active: TerminalColor | null } {
    let text = "";
    let current = active;
    for (const run of groupCells(line)) {
      // Blanks show no foreground, so they never need a sequence.
      if (
        run.glyph !== BLANK &&
        run.color.kind !== "none" &&
        !(current && isSameColor(current, run.color))
      ) {
        text += foregroundSequence(run.color);
        current = run.color;
      }
      text += run.glyph.repeat(run.count);
    }
    return { text, active: current };
  }
}
