import fs from "fs";
import os from "os";
import path from "path";

interface Logger {
  /** Appends a timestamped line to the log file. */
  log(message: string): void;
  isLoggingEnabled(): boolean;
}

class FileLogger implements Logger {
  private fd: number | null = null;

  constructor(private filePath: string) {}

  isLoggingEnabled(): boolean {
    return true;
  }

  log(message: string): void {
    if (this.fd === null) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      this.fd = fs.openSync(this.filePath, "a");
    }
    fs.writeSync(this.fd, `[${new Date().toISOString()}] ${message}\n`);
  }
}

class EmptyLogger implements Logger {
  isLoggingEnabled(): boolean {
    return false;
  }

  log(_message: string): void {
    // No-op
  }
}

let logger: Logger | null = null;

function defaultLogFilePath(): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
  return path.join(
    os.tmpdir(),
    "code-minimap",
    `code-minimap-${timestamp}.log`,
  );
}

/**
 * Builds the process-wide logger from the environment. Logging is off unless
 * `DEBUG` is set; `CODE_MINIMAP_LOG_FILE` picks the file.
 */
export function initLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  if (!env["DEBUG"]) {
    logger = new EmptyLogger();
  } else {
    logger = new FileLogger(
      env["CODE_MINIMAP_LOG_FILE"] || defaultLogFilePath(),
    );
  }
  return logger;
}

export function log(message: string): void {
  (logger ?? initLogger()).log(message);
}

export function isLoggingEnabled(): boolean {
  return (logger ?? initLogger()).isLoggingEnabled();
}
