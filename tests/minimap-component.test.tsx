import { describe, expect, test } from "vitest";
import { render } from "ink-testing-library";
import React from "react";
import stripAnsi from "strip-ansi";
import { Minimap, sampleRows } from "../src/components/visual/minimap.js";
import type { RenderedLine } from "../src/utils/render/types.js";

const row = (glyphs: string): RenderedLine =>
  [...glyphs].map((glyph) => ({
    color: { kind: "ansi256", index: 148 },
    glyph,
  }));

describe("Minimap component", () => {
  test("renders one text row per rendered line", () => {
    const { lastFrame } = render(
      <Minimap rows={[row("▀▀ ▀"), row("▀▀▀▀▀")]} />,
    );
    expect(stripAnsi(lastFrame() ?? "")).toBe("──Map──\n▀▀ ▀\n▀▀▀▀▀");
  });

  test("uses a custom title", () => {
    const { lastFrame } = render(<Minimap rows={[row("▀")]} title="a.rs" />);
    expect(stripAnsi(lastFrame() ?? "")).toBe("a.rs\n▀");
  });

  test("samples rows to the requested height", () => {
    const rows = [row("▀"), row("▀▀"), row("▀▀▀"), row("▀▀▀▀")];
    const { lastFrame } = render(<Minimap rows={rows} height={2} />);
    expect(stripAnsi(lastFrame() ?? "")).toBe("──Map──\n▀\n▀▀▀");
  });
});

describe("sampleRows", () => {
  test("keeps every row when they fit", () => {
    expect(sampleRows([1, 2, 3], 5)).toEqual([1, 2, 3]);
    expect(sampleRows([1, 2, 3])).toEqual([1, 2, 3]);
  });

  test("takes every nth row otherwise", () => {
    expect(sampleRows([1, 2, 3, 4, 5, 6, 7], 3)).toEqual([1, 4, 7]);
  });
});
