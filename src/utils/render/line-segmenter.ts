import type { ColorMapper } from "../color/color-mapper.js";
import type { Token } from "../highlight/syntax-class.js";
import type { SourceChar } from "./types.js";

export interface SegmentOptions {
  /**
   * Characters kept per line; 0 keeps all. Every character takes at least one
   * column, so a column limit is a safe cap.
   */
  maxChars?: number;
}

/**
 * Split a classified source into lines of colored code points.
 *
 * Lines end at `\n`; a `\r` right before it is dropped. A trailing `\n` ends
 * the last line without starting another, so `"a\n"` is one line and `""` is
 * none. Characters past `maxChars` are skipped without being collected.
 */
export function* segmentLines(
  source: string,
  tokens: Iterable<Token>,
  mapper: ColorMapper,
  { maxChars = 0 }: SegmentOptions = {},
): Generator<Array<SourceChar>> {
  const limit = maxChars > 0 ? maxChars : Infinity;
  let line: Array<SourceChar> = [];
  let truncated = false;
  let newline = source.indexOf("\n");
  for (const token of tokens) {
    const color = mapper.colorFor(token.syntaxClass);
    let offset = token.start;
    while (offset < token.end) {
      if (newline !== -1 && newline < offset) {
        newline = source.indexOf("\n", offset);
      }
      const endsLine = newline !== -1 && newline < token.end;
      const stop = endsLine ? newline : token.end;
      if (line.length < limit) {
        for (const char of source.slice(offset, stop)) {
          if (line.length >= limit) {
            truncated = true;
            break;
          }
          line.push({ char, color });
        }
      } else if (stop > offset) {
        truncated = true;
      }
      if (!endsLine) {
        offset = stop;
        continue;
      }
      if (!truncated && line[line.length - 1]?.char === "\r") {
        line.pop();
      }
      yield line;
      line = [];
      truncated = false;
      offset = newline + 1;
    }
  }
  if (line.length > 0) {
    yield line;
  }
}
