import { chalkStderr } from "chalk";
import fs from "fs/promises";
import type { Readable, Writable } from "stream";
import { log } from "./utils/logger/log.js";
import {
  createMinimapError,
  ERROR_CODES,
  formatErrorForUser,
  isMinimapError,
  type MinimapError,
} from "./utils/minimap-errors.js";
import type { MinimapPrinter } from "./utils/render/printer.js";

export interface RunOptions {
  files: ReadonlyArray<string>;
  printer: MinimapPrinter;
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
}

export const STDIN_SOURCE = "stdin";

export async function readInput(
  source: string,
  stdin: Readable,
): Promise<string> {
  try {
    if (source === STDIN_SOURCE) {
      const chunks: Array<Buffer> = [];
      for await (const chunk of stdin) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
      }
      return Buffer.concat(chunks).toString("utf-8");
    }
    return await fs.readFile(source, "utf-8");
  } catch (error) {
    throw createMinimapError(ERROR_CODES.UNREADABLE_INPUT, {
      source,
      cause: error,
    });
  }
}

function isBrokenPipe(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "EPIPE" || error.code === "ERR_STREAM_DESTROYED")
  );
}

/**
 * Write one chunk and wait until the stream has taken it.
 *
 * @throws MinimapError BROKEN_OUTPUT_PIPE once the reader has gone away
 */
export function writeOutput(stream: Writable, chunk: string): Promise<void> {
  return new Promise((resolve, reject) => {
    if (stream.destroyed || stream.writableEnded) {
      reject(
        createMinimapError(ERROR_CODES.BROKEN_OUTPUT_PIPE, { source: "stdout" }),
      );
      return;
    }
    stream.write(chunk, (error) => {
      if (!error) {
        resolve();
      } else if (isBrokenPipe(error)) {
        reject(
          createMinimapError(ERROR_CODES.BROKEN_OUTPUT_PIPE, {
            source: "stdout",
            cause: error,
          }),
        );
      } else {
        reject(error);
      }
    });
  });
}

function inputSources(files: ReadonlyArray<string>): Array<string> {
  if (files.length === 0 || (files.length === 1 && files[0] === "-")) {
    return [STDIN_SOURCE];
  }
  return [...files];
}

/**
 * Render every input in order. Per-input failures are reported on stderr and
 * the run continues; a closed stdout ends the run quietly.
 *
 * @returns the process exit code, 1 if any input failed before the run ended
 */
export async function runMinimap({
  files,
  printer,
  stdin,
  stdout,
  stderr,
}: RunOptions): Promise<number> {
  let exitCode = 0;

  const reportError = (error: MinimapError): void => {
    exitCode = 1;
    stderr.write(`${chalkStderr.red(formatErrorForUser(error))}\n`);
  };
  // The write callback carries the same error; this only keeps an 'error'
  // event from going unhandled.
  const onOutputError = (error: Error): void => {
    log(`stdout error: ${error.message}`);
  };
  stdout.on("error", onOutputError);
  let outputClosed = false;

  try {
    for (const source of inputSources(files)) {
      let output: string;
      try {
        const content = await readInput(source, stdin);
        output = await printer.render(
          content,
          source === STDIN_SOURCE ? undefined : source,
        );
      } catch (error) {
        if (
          isMinimapError(error, ERROR_CODES.UNREADABLE_INPUT) ||
          isMinimapError(error, ERROR_CODES.UNKNOWN_LANGUAGE)
        ) {
          reportError(error);
          continue;
        }
        throw error;
      }
      if (output) {
        await writeOutput(stdout, output);
      }
    }
  } catch (error) {
    if (isMinimapError(error, ERROR_CODES.BROKEN_OUTPUT_PIPE)) {
      log("Output closed, stopping");
      outputClosed = true;
      return exitCode;
    }
    throw error;
  } finally {
    // A closed stream may still emit 'error' after the write callback.
    if (!outputClosed) {
      stdout.off("error", onOutputError);
    }
  }

  return exitCode;
}
