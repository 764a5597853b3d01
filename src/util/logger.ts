import { Chalk, type ChalkInstance } from "chalk";

export type LogLevel = "error" | "warn" | "info" | "ok" | "debug";

export const LOG_LEVELS = ["error", "warn", "info", "ok", "debug"] as const satisfies readonly LogLevel[];

const RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, ok: 2, debug: 3 };

/** Anything with a `write(string)`, such as `process.stderr`. */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  /** Most verbose level that is written (default `info`). */
  level?: LogLevel;
  /** Where lines go (default `process.stderr`). */
  sink?: LogSink;
  /** Colour the level labels (default true). */
  color?: boolean;
}

export class Logger {
  readonly module: string | undefined;
  level: LogLevel;
  private sink: LogSink;
  private chalk: ChalkInstance;

  constructor(module?: string, opts: LoggerOptions = {}) {
    this.module = module;
    this.level = opts.level ?? "info";
    this.sink = opts.sink ?? process.stderr;
    this.chalk = new Chalk({ level: opts.color === false ? 0 : 2 });
  }

  error(message: string) {
    this.log("error", message);
  }
  warn(message: string) {
    this.log("warn", message);
  }
  info(message: string) {
    this.log("info", message);
  }
  ok(message: string) {
    this.log("ok", message);
  }
  debug(message: string) {
    this.log("debug", message);
  }

  enabled(level: LogLevel): boolean {
    return RANK[level] <= RANK[this.level];
  }

  /** Logger for a sub-module sharing this one's sink and settings. */
  child(module: string): Logger {
    const child = new Logger(this.module ? `${this.module} | ${module}` : module, {
      level: this.level,
      sink: this.sink,
    });
    child.chalk = this.chalk;
    return child;
  }

  private log(level: LogLevel, message: string) {
    if (!this.enabled(level)) return;
    this.sink.write(`${this.format(level, message)}\n`);
  }

  format(level: LogLevel, message: string): string {
    const labels: Record<LogLevel, string> = {
      error: this.chalk.red("error"),
      warn: this.chalk.yellow(" warn"),
      info: this.chalk.cyan(" info"),
      ok: this.chalk.green("   ok"),
      debug: this.chalk.blue("debug"),
    };
    const module = this.module ? `${this.chalk.gray(`[${this.module}]`)} ` : "";
    return `${labels[level]} ${module}${message}`;
  }
}
