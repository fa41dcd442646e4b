/**
 * Color support of the output terminal. Resolved once at startup and passed
 * to everything that emits color.
 */
export type TerminalCapability = "none" | "ansi256" | "truecolor";

const TRUE_COLOR_VALUES = new Set(["truecolor", "24bit"]);

/**
 * Detection order:
 * 1. COLORTERM=truecolor or COLORTERM=24bit (exact match) → truecolor
 * 2. NO_COLOR set, or TERM=dumb → none
 * 3. Otherwise → ansi256
 */
export function detectTerminalCapability(
  env: NodeJS.ProcessEnv = process.env,
): TerminalCapability {
  const colorTerm = env["COLORTERM"];
  if (colorTerm !== undefined && TRUE_COLOR_VALUES.has(colorTerm)) {
    return "truecolor";
  }
  if (env["NO_COLOR"] || env["TERM"] === "dumb") {
    return "none";
  }
  return "ansi256";
}
