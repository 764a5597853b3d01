// Morse Tree Codec: public barrel export

// ─── Codec ──────────────────────────────────────────────────────────────────
export * from "./morse/index.js";

// ─── Errors ─────────────────────────────────────────────────────────────────
export { MorseError, ConfigError, describeSymbol } from "./errors.js";
export type { MorseErrorKind } from "./errors.js";

// ─── Logging & config ───────────────────────────────────────────────────────
export { Logger, LOG_LEVELS } from "./util/logger.js";
export type { LogLevel, LogSink, LoggerOptions } from "./util/logger.js";
export { loadConfig } from "./config.js";
export type { MorseConfig } from "./config.js";

// ─── CLI ────────────────────────────────────────────────────────────────────
export { run, encodeWords, decodeCodes, ExitCode, SCRIPT_NAME } from "./cli.js";
export type { CliIO } from "./cli.js";
