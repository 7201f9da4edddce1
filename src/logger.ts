/**
 * Logger interface: abstracts output so the controller can log to the
 * console, to .cadence/logs/cadence.log, or to both.
 *
 * Components accept a Logger at construction time:
 * - ConsoleLogger (default) writes directly to stdout/stderr
 * - FileLogger appends timestamped lines to a log file
 * - TeeLogger fans out to several loggers (the CLI uses console + file)
 */

import { appendFileSync, existsSync, mkdirSync } from "fs";
import { dirname } from "path";

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/**
 * Debug output is opt-in: CADENCE_DEBUG=1 or `cadence run --verbose`
 */
export function isDebugEnabled(): boolean {
  return process.env.CADENCE_DEBUG === "1" || process.env.CADENCE_DEBUG === "true";
}

export class ConsoleLogger implements Logger {
  constructor(private readonly verbose: boolean = isDebugEnabled()) {}

  log(message: string): void {
    console.log(message);
  }
  warn(message: string): void {
    console.warn(message);
  }
  error(message: string): void {
    console.error(message);
  }
  debug(message: string): void {
    if (this.verbose) {
      console.log(`[debug] ${message}`);
    }
  }
}

type Level = "INFO" | "WARN" | "ERROR" | "DEBUG";

export class FileLogger implements Logger {
  constructor(
    private readonly path: string,
    private readonly verbose: boolean = isDebugEnabled()
  ) {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  log(message: string): void {
    this.write("INFO", message);
  }
  warn(message: string): void {
    this.write("WARN", message);
  }
  error(message: string): void {
    this.write("ERROR", message);
  }
  debug(message: string): void {
    if (this.verbose) {
      this.write("DEBUG", message);
    }
  }

  private write(level: Level, message: string): void {
    appendFileSync(this.path, `[${new Date().toISOString()}] [${level}] ${message}\n`);
  }
}

export class TeeLogger implements Logger {
  private readonly loggers: Logger[];

  constructor(...loggers: Logger[]) {
    this.loggers = loggers;
  }

  log(message: string): void {
    for (const logger of this.loggers) logger.log(message);
  }
  warn(message: string): void {
    for (const logger of this.loggers) logger.warn(message);
  }
  error(message: string): void {
    for (const logger of this.loggers) logger.error(message);
  }
  debug(message: string): void {
    for (const logger of this.loggers) logger.debug(message);
  }
}

/**
 * Logger that drops everything (tests, `--quiet`-style call sites)
 */
export class SilentLogger implements Logger {
  log(): void {}
  warn(): void {}
  error(): void {}
  debug(): void {}
}
