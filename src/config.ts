import fs from "fs";
import os from "os";
import path from "path";
import { z } from "zod";
import type { ThemeOverrides } from "./utils/color/color-mapper.js";
import { isHexColor } from "./utils/color/rgb.js";
import {
  detectTerminalCapability,
  type TerminalCapability,
} from "./utils/color/terminal-capability.js";
import { DEFAULT_TAB_WIDTH } from "./utils/render/line-compressor.js";
import { DEFAULT_GLYPH } from "./utils/render/minimap-emitter.js";
import { createMinimapError, ERROR_CODES } from "./utils/minimap-errors.js";
import { log } from "./utils/logger/log.js";

export const CONFIG_DIR = path.join(os.homedir(), ".code-minimap");
export const CONFIG_FILEPATH = path.join(CONFIG_DIR, "config.json");

const hexColor = z
  .string()
  .refine(isHexColor, { message: "expected a #rrggbb color" });

const ThemeSchema = z
  .object({
    default: hexColor,
    comment: hexColor,
    string: hexColor,
    number: hexColor,
    constant: hexColor,
    keyword: hexColor,
    operator: hexColor,
    punctuation: hexColor,
    function: hexColor,
    type: hexColor,
    variable: hexColor,
    tag: hexColor,
  })
  .partial()
  .strict();

const StoredConfigSchema = z
  .object({
    tabs: z.number().int().min(0),
    columns: z.number().int().min(0),
    blankWhitespace: z.boolean(),
    glyph: z
      .string()
      .refine((value) => [...value].length === 1, {
        message: "expected a single character",
      }),
    theme: ThemeSchema,
  })
  .partial()
  .strict();

/** Shape of `~/.code-minimap/config.json` */
export type StoredConfig = z.infer<typeof StoredConfigSchema>;

/** Flags as they come off the command line. */
export interface CliFlags {
  language?: string;
  columns?: number;
  tabs?: number;
  blankWhitespace?: boolean;
}

/** Fully resolved settings for one run. */
export interface AppConfig {
  language?: string;
  columns: number;
  tabs: number;
  blankWhitespace: boolean;
  glyph: string;
  theme: ThemeOverrides;
  capability: TerminalCapability;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
    .join("; ");
}

/**
 * Read and validate the stored config. A missing file yields `{}`.
 *
 * @throws MinimapError INVALID_CONFIG
 */
export function loadStoredConfig(
  configPath: string = CONFIG_FILEPATH,
): StoredConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      log(`No config file at ${configPath}`);
      return {};
    }
    throw createMinimapError(ERROR_CODES.INVALID_CONFIG, {
      source: configPath,
      cause: error,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw createMinimapError(ERROR_CODES.INVALID_CONFIG, {
      source: configPath,
      cause: error,
    });
  }

  const parsed = StoredConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw createMinimapError(ERROR_CODES.INVALID_CONFIG, {
      source: configPath,
      cause: formatIssues(parsed.error),
    });
  }
  return parsed.data;
}

function validateCount(
  name: "columns" | "tabs",
  value: number | undefined,
): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Number.isInteger(value) || value < 0) {
    throw createMinimapError(ERROR_CODES.INVALID_OPTION, {
      source: `--${name}`,
      cause: `expected a non-negative integer, got ${value}`,
    });
  }
  return value;
}

/**
 * Merge flags over the stored config over defaults. Terminal capability is
 * detected here, once.
 *
 * @throws MinimapError INVALID_OPTION
 */
export function resolveConfig(
  flags: CliFlags,
  stored: StoredConfig,
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  return {
    language: flags.language?.trim() || undefined,
    columns: validateCount("columns", flags.columns) ?? stored.columns ?? 0,
    tabs: validateCount("tabs", flags.tabs) ?? stored.tabs ?? DEFAULT_TAB_WIDTH,
    blankWhitespace: flags.blankWhitespace || stored.blankWhitespace || false,
    glyph: stored.glyph ?? DEFAULT_GLYPH,
    theme: stored.theme ?? {},
    capability: detectTerminalCapability(env),
  };
}

export function loadConfig({
  flags,
  configPath,
  env = process.env,
}: {
  flags: CliFlags;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}): AppConfig {
  const stored = loadStoredConfig(
    configPath ?? env["CODE_MINIMAP_CONFIG"] ?? CONFIG_FILEPATH,
  );
  return resolveConfig(flags, stored, env);
}
