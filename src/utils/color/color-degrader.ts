import type { Rgb } from "./rgb.js";
import type { TerminalCapability } from "./terminal-capability.js";

export type TerminalColor =
  | { kind: "none" }
  | { kind: "ansi256"; index: number }
  | { kind: "rgb"; r: number; g: number; b: number };

const NO_COLOR: TerminalColor = { kind: "none" };

// Channel levels of the 6x6x6 cube at indices 16-231.
const CUBE_LEVELS = [0, 95, 135, 175, 215, 255];

const GRAY_START = 232;
const GRAY_STEPS = 24;

function nearestCubeLevel(value: number): number {
  let best = 0;
  for (let i = 1; i < CUBE_LEVELS.length; i++) {
    // strict comparison keeps the lower level on ties
    if (
      Math.abs(value - (CUBE_LEVELS[i] ?? 0)) <
      Math.abs(value - (CUBE_LEVELS[best] ?? 0))
    ) {
      best = i;
    }
  }
  return best;
}

function distance(a: Rgb, b: Rgb): number {
  return (a.r - b.r) ** 2 + (a.g - b.g) ** 2 + (a.b - b.b) ** 2;
}

function grayLevel(step: number): number {
  return 8 + 10 * step;
}

/**
 * Nearest xterm-256 palette index, searching the color cube (16-231) and the
 * grayscale ramp (232-255). The 16 system colors are left out since
 * terminals theme them freely. Ties go to the lower index.
 */
export function rgbToAnsi256(color: Rgb): number {
  const ri = nearestCubeLevel(color.r);
  const gi = nearestCubeLevel(color.g);
  const bi = nearestCubeLevel(color.b);
  const cubeIndex = 16 + 36 * ri + 6 * gi + bi;
  const cubeDistance = distance(color, {
    r: CUBE_LEVELS[ri] ?? 0,
    g: CUBE_LEVELS[gi] ?? 0,
    b: CUBE_LEVELS[bi] ?? 0,
  });

  // The closest gray to any color is the one nearest its channel mean.
  const mean = (color.r + color.g + color.b) / 3;
  let grayStep = 0;
  for (let step = 1; step < GRAY_STEPS; step++) {
    if (Math.abs(mean - grayLevel(step)) < Math.abs(mean - grayLevel(grayStep))) {
      grayStep = step;
    }
  }
  const gray = grayLevel(grayStep);
  const grayDistance = distance(color, { r: gray, g: gray, b: gray });

  return grayDistance < cubeDistance ? GRAY_START + grayStep : cubeIndex;
}

/**
 * Reduce a color to what the terminal can show.
 */
export function degradeColor(
  color: Rgb,
  capability: TerminalCapability,
): TerminalColor {
  switch (capability) {
    case "truecolor":
      return { kind: "rgb", r: color.r, g: color.g, b: color.b };
    case "ansi256":
      return { kind: "ansi256", index: rgbToAnsi256(color) };
    case "none":
      return NO_COLOR;
  }
}

export function isSameColor(a: TerminalColor, b: TerminalColor): boolean {
  switch (a.kind) {
    case "none":
      return b.kind === "none";
    case "ansi256":
      return b.kind === "ansi256" && a.index === b.index;
    case "rgb":
      return b.kind === "rgb" && a.r === b.r && a.g === b.g && a.b === b.b;
  }
}
