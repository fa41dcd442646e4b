#!/usr/bin/env node
import { chalkStderr } from "chalk";
import meow from "meow";
import { runMinimap } from "./app.js";
import { loadConfig } from "./config.js";
import { ShikiClassifier } from "./utils/highlight/shiki-classifier.js";
import { initLogger, log } from "./utils/logger/log.js";
import {
  formatErrorForUser,
  isMinimapError,
} from "./utils/minimap-errors.js";
import { MinimapPrinter } from "./utils/render/printer.js";

const cli = meow(
  `
  Usage
    $ code-minimap [file...]

  Reads standard input when no file (or "-") is given.

  Options
    -l, --language <name>   Language for highlighting, as a name (rust) or
                            an extension (rs)
    -c, --columns <n>       Maximum number of columns (0 for no limit)
    -t, --tabs <n>          Tab width (0 passes tabs through), default 4
        --blank-whitespace  Leave whitespace blank instead of drawing it
        --config <path>     Config file (default ~/.code-minimap/config.json)

  Environment
    COLORTERM=truecolor|24bit enables 24-bit color; NO_COLOR or TERM=dumb
    disables color. DEBUG=1 writes a debug log to the temp directory.

  Examples
    $ code-minimap src/main.rs
    $ cat script | code-minimap -l sh -c 80
`,
  {
    importMeta: import.meta,
    flags: {
      language: { type: "string", shortFlag: "l" },
      columns: { type: "number", shortFlag: "c" },
      tabs: { type: "number", shortFlag: "t" },
      blankWhitespace: { type: "boolean" },
      config: { type: "string" },
    },
  },
);

initLogger(process.env);

try {
  const config = loadConfig({
    flags: {
      language: cli.flags.language,
      columns: cli.flags.columns,
      tabs: cli.flags.tabs,
      blankWhitespace: cli.flags.blankWhitespace,
    },
    configPath: cli.flags.config,
  });
  log(`Terminal capability: ${config.capability}`);

  const printer = new MinimapPrinter({
    ...config,
    classifier: new ShikiClassifier(),
  });
  process.exitCode = await runMinimap({
    files: cli.input,
    printer,
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
  });
} catch (error) {
  if (!isMinimapError(error)) {
    throw error;
  }
  process.stderr.write(`${chalkStderr.red(formatErrorForUser(error))}\n`);
  process.exitCode = 2;
}
