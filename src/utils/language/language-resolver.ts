import path from "path";
import { createMinimapError, ERROR_CODES } from "../minimap-errors.js";
import {
  getLanguageTable,
  type Language,
  type LanguageTable,
} from "./language-table.js";

export interface ResolveLanguageInput {
  /** Explicit language from the command line */
  override?: string;
  /** File path, absent for stdin */
  path?: string;
  /** Decoded content; only the first few lines are inspected */
  content: string;
}

/** Lines scanned for a shebang or mode-line. */
export const SNIFF_LINES = 5;

/**
 * Resolve the language of one input.
 *
 * Precedence: explicit override, then file name/extension, then a shebang or
 * editor mode-line in the content.
 *
 * @throws MinimapError UNKNOWN_LANGUAGE when the override matches nothing
 * @throws MinimapError UNDETERMINED_LANGUAGE when no signal is found
 */
export function resolveLanguage(
  input: ResolveLanguageInput,
  table: LanguageTable = getLanguageTable(),
): Language {
  const source = input.path ?? "stdin";

  if (input.override !== undefined) {
    const language = table.findByToken(input.override);
    if (!language) {
      throw createMinimapError(ERROR_CODES.UNKNOWN_LANGUAGE, {
        source,
        language: input.override,
        suggestion:
          "use a language name such as rust or an extension such as rs",
      });
    }
    return language;
  }

  if (input.path) {
    const language = languageFromPath(input.path, table);
    if (language) {
      return language;
    }
  }

  const language = sniffLanguage(input.content, table);
  if (language) {
    return language;
  }

  throw createMinimapError(ERROR_CODES.UNDETERMINED_LANGUAGE, { source });
}

export function languageFromPath(
  filePath: string,
  table: LanguageTable,
): Language | undefined {
  const basename = path.basename(filePath);
  const byName = table.findByFilename(basename);
  if (byName) {
    return byName;
  }
  // `.zshrc` has no extension in path terms; only the file name table knows it.
  const extension = path.extname(basename);
  return extension ? table.findByExtension(extension) : undefined;
}

export function sniffLanguage(
  content: string,
  table: LanguageTable,
): Language | undefined {
  const lines = headLines(content, SNIFF_LINES);
  const first = lines[0];
  if (first?.startsWith("#!")) {
    const interpreter = parseShebang(first);
    const language = interpreter
      ? languageFromInterpreter(interpreter, table)
      : undefined;
    if (language) {
      return language;
    }
  }
  for (const line of lines) {
    const mode = parseModeLine(line);
    const language = mode ? table.findByToken(mode) : undefined;
    if (language) {
      return language;
    }
  }
  return undefined;
}

function headLines(content: string, count: number): Array<string> {
  const lines: Array<string> = [];
  let start = 0;
  while (lines.length < count && start <= content.length) {
    const end = content.indexOf("\n", start);
    if (end === -1) {
      lines.push(content.slice(start));
      break;
    }
    lines.push(content.slice(start, end).replace(/\r$/, ""));
    start = end + 1;
  }
  return lines;
}

/**
 * Interpreter base name from a shebang line, looking through `env` and its
 * options and variable assignments.
 *
 * `#!/usr/bin/env -S python3 -u` → `python3`
 */
export function parseShebang(line: string): string | undefined {
  const words = line.slice(2).trim().split(/\s+/).filter(Boolean);
  const command = words.shift();
  if (!command) {
    return undefined;
  }
  let interpreter = path.posix.basename(command);
  if (interpreter === "env") {
    const next = words.find(
      (word) => !word.startsWith("-") && !word.includes("="),
    );
    if (!next) {
      return undefined;
    }
    interpreter = path.posix.basename(next);
  }
  return interpreter;
}

function languageFromInterpreter(
  interpreter: string,
  table: LanguageTable,
): Language | undefined {
  return (
    table.findByInterpreter(interpreter) ??
    // python3.11 → python, ruby2 → ruby
    table.findByInterpreter(interpreter.replace(/[\d.]+$/, ""))
  );
}

const EMACS_MODE_LINE = /-\*-(.*?)-\*-/;
const EMACS_MODE_VAR = /(?:^|;)\s*mode\s*:\s*([^\s;]+)/i;
const VIM_MODE_LINE =
  /(?:^|\s)(?:vim?|Vim|ex):.*?\b(?:ft|filetype|syntax)=([\w+#-]+)/;

/**
 * Language named by an Emacs (`-*- mode: python -*-`, `-*- C++ -*-`) or Vim
 * (`vim: set ft=ruby:`) mode-line.
 */
export function parseModeLine(line: string): string | undefined {
  const emacs = EMACS_MODE_LINE.exec(line)?.[1];
  if (emacs !== undefined) {
    const variable = EMACS_MODE_VAR.exec(emacs)?.[1];
    if (variable) {
      return variable;
    }
    const bare = emacs.trim();
    if (bare && !bare.includes(":")) {
      return bare;
    }
  }
  return VIM_MODE_LINE.exec(line)?.[1];
}
