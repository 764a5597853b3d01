// Morse Tree Codec: Command Line Interface

import yargs from "yargs";
import { ConfigError } from "./errors.js";
import { type MorseConfig, loadConfig } from "./config.js";
import { Logger, type LogSink } from "./util/logger.js";
import { renderTable, renderTree, renderUsage } from "./morse/chart.js";
import { decode, encode, resolveSymbols } from "./morse/codec.js";
import { selfTest } from "./morse/selftest.js";
import type { CodecOptions } from "./morse/types.js";

export const SCRIPT_NAME = "morse";

export const ExitCode = {
  Ok: 0,
  SelfTestFailed: 1,
  NoArguments: 2,
  Usage: 3,
  InvalidCode: 4,
  BadConfig: 5,
  InvalidLetter: 6,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export interface CliIO {
  stdout: LogSink;
  stderr: LogSink;
  env: NodeJS.ProcessEnv;
}

class UsageError extends Error {
  public readonly name = "UsageError";
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

/** ASCII a-z to upper case; every other character is left as it is. */
function asciiUpper(ch: string): string {
  return ch >= "a" && ch <= "z" ? ch.toUpperCase() : ch;
}

/** Encode each word on its own line; ASCII letters are upper-cased first. */
export function encodeWords(words: readonly string[], opts: CodecOptions, log: Logger): [string[], ExitCode] {
  const lines: string[] = [];
  for (const word of words) {
    const codes: string[] = [];
    for (const ch of word) {
      const result = encode(asciiUpper(ch), opts);
      if (!result.ok) {
        log.error(`${result.error.message} in ${JSON.stringify(word)}`);
        return [lines, ExitCode.InvalidLetter];
      }
      codes.push(result.value);
    }
    log.debug(`${word} -> ${codes.join(" ")}`);
    lines.push(codes.join(" "));
  }
  return [lines, ExitCode.Ok];
}

/** Decode one code per argument into a single line of letters. */
export function decodeCodes(codes: readonly string[], opts: CodecOptions, log: Logger): [string, ExitCode] {
  let letters = "";
  for (const code of codes) {
    const result = decode(code, opts);
    if (!result.ok) {
      log.error(`${result.error.message} in ${JSON.stringify(code)}`);
      return [letters, ExitCode.InvalidCode];
    }
    log.debug(`${code} -> ${result.value}`);
    letters += result.value;
  }
  return [letters, ExitCode.Ok];
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

function defaultIO(): CliIO {
  return { stdout: process.stdout, stderr: process.stderr, env: process.env };
}

/** Arguments yargs collected after the first `--`. */
function afterSeparator(rest: unknown): string[] {
  return Array.isArray(rest) ? rest.map(String) : [];
}

function readConfig(io: CliIO): MorseConfig | undefined {
  try {
    return loadConfig(io.env);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    new Logger("cli", { sink: io.stderr, color: false }).error(err.message);
    return undefined;
  }
}

/**
 * Run the CLI with `args` (without the node and script paths).
 * Resolves to the process exit code; never rejects for user errors.
 */
export async function run(args: readonly string[], io: CliIO = defaultIO()): Promise<number> {
  const config = readConfig(io);
  if (!config) return ExitCode.BadConfig;

  const log = new Logger("cli", {
    level: config.logLevel,
    sink: io.stderr,
    color: config.color,
  });

  const report = selfTest();
  if (!report.ok) {
    log.error(`Self-test failed at ${report.letter} (${report.stage})`);
    return ExitCode.SelfTestFailed;
  }

  if (args.length === 0) {
    io.stderr.write(renderUsage(SCRIPT_NAME));
    return ExitCode.NoArguments;
  }

  let code: ExitCode = ExitCode.Ok;

  const symbolsFor = (argv: { dot?: string; dash?: string }): CodecOptions | undefined => {
    const opts = { dot: argv.dot ?? config.dot, dash: argv.dash ?? config.dash };
    try {
      resolveSymbols(opts);
      return opts;
    } catch (err) {
      if (!(err instanceof RangeError)) throw err;
      log.error(err.message);
      code = ExitCode.BadConfig;
      return undefined;
    }
  };

  const parser = yargs([...args])
    .scriptName(SCRIPT_NAME)
    // Codes such as "-.-" and "---" look like flags; keep them as arguments.
    // "--" (M) is the end-of-options marker, so what follows it is collected
    // separately and put back in place below.
    .parserConfiguration({ "unknown-options-as-args": true, "populate--": true })
    .option("dot", { type: "string", describe: "character for the short signal" })
    .option("dash", { type: "string", describe: "character for the long signal" })
    .option("verbose", { type: "boolean", default: false, describe: "log debug output" })
    .middleware((argv) => {
      if (argv.verbose) log.level = "debug";
    })
    .command(
      "encode <words..>",
      "letters to Morse code",
      (y) => y.positional("words", { type: "string", array: true, demandOption: true }),
      (argv) => {
        const opts = symbolsFor(argv);
        if (!opts) return;
        const [lines, status] = encodeWords(argv.words.map(String), opts, log.child("encode"));
        for (const line of lines) io.stdout.write(`${line}\n`);
        code = status;
      },
    )
    .command(
      "decode [codes..]",
      "Morse code to letters",
      (y) => y.positional("codes", { type: "string", array: true }),
      (argv) => {
        const codes = (argv.codes ?? []).map(String);
        if (args.includes("--")) codes.push("--", ...afterSeparator(argv["--"]));
        if (codes.length === 0) throw new UsageError("decode needs at least one code");
        const opts = symbolsFor(argv);
        if (!opts) return;
        const [letters, status] = decodeCodes(codes, opts, log.child("decode"));
        if (status === ExitCode.Ok) io.stdout.write(`${letters}\n`);
        code = status;
      },
    )
    .command(
      "table",
      "the codebook as a table",
      (y) => y,
      (argv) => {
        const opts = symbolsFor(argv);
        if (!opts) return;
        io.stdout.write(`${renderTable(opts).join("\n")}\n`);
      },
    )
    .command(
      "tree",
      "the codebook as a tree",
      (y) => y,
      () => {
        io.stdout.write(`${renderTree().join("\n")}\n`);
      },
    )
    .demandCommand(1)
    .strict()
    .help(false)
    .version(false)
    .exitProcess(false)
    .fail((msg, err) => {
      throw err ?? new UsageError(msg);
    });

  try {
    await parser.parseAsync();
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    log.error(err.message);
    io.stderr.write(renderUsage(SCRIPT_NAME));
    return ExitCode.Usage;
  }

  return code;
}
