import { Box, Text } from "ink";
import React from "react";
import type { TerminalColor } from "../../utils/color/color-degrader.js";
import { toHex } from "../../utils/color/rgb.js";
import { groupCells } from "../../utils/render/minimap-emitter.js";
import type { RenderedLine } from "../../utils/render/types.js";

interface MinimapProps {
  rows: ReadonlyArray<RenderedLine>;
  /** Sample rows to fit this many; all rows when omitted. */
  height?: number;
  title?: string;
}

function inkColor(color: TerminalColor): string | undefined {
  switch (color.kind) {
    case "none":
      return undefined;
    case "ansi256":
      return `ansi256(${color.index})`;
    case "rgb":
      return toHex(color);
  }
}

export function sampleRows<T>(
  rows: ReadonlyArray<T>,
  height?: number,
): Array<T> {
  if (!height || height <= 0 || rows.length <= height) {
    return [...rows];
  }
  const scale = Math.ceil(rows.length / height);
  const sampled: Array<T> = [];
  for (let i = 0; i < height && i * scale < rows.length; i++) {
    const row = rows[i * scale];
    if (row !== undefined) {
      sampled.push(row);
    }
  }
  return sampled;
}

export function Minimap({
  rows,
  height,
  title = "──Map──",
}: MinimapProps): React.ReactElement {
  const visibleRows = sampleRows(rows, height);

  return (
    <Box flexDirection="column">
      <Text dimColor>{title}</Text>
      {visibleRows.map((row, i) => (
        <Text key={i}>
          {row.length === 0
            ? " "
            : groupCells(row).map((run, j) => (
                <Text key={j} color={inkColor(run.color)}>
                  {run.glyph.repeat(run.count)}
                </Text>
              ))}
        </Text>
      ))}
    </Box>
  );
}
