// Morse Tree Codec: Error Types

/** `InvalidSymbol` comes from encode, `InvalidCharacter` from decode. */
export type MorseErrorKind = "InvalidSymbol" | "InvalidCharacter";

export class MorseError extends Error {
  public readonly name = "MorseError";

  constructor(
    message: string,
    public kind: MorseErrorKind,
    public symbol: string,
    public position?: number,
  ) {
    super(message);
  }
}

/** Describe a character for error messages, escaping control characters. */
export function describeSymbol(symbol: string): string {
  if (symbol.length === 0) return "empty input";
  const code = symbol.charCodeAt(0);
  if (symbol.length === 1 && (code < 0x20 || code === 0x7f)) {
    return `0x${code.toString(16).padStart(2, "0")}`;
  }
  return JSON.stringify(symbol);
}

export function invalidSymbol(symbol: string): MorseError {
  return new MorseError(`No Morse code for ${describeSymbol(symbol)}`, "InvalidSymbol", symbol);
}

export function invalidCharacter(symbol: string, position: number): MorseError {
  return new MorseError(
    `Invalid Morse symbol ${describeSymbol(symbol)} at position ${position}`,
    "InvalidCharacter",
    symbol,
    position,
  );
}

/** Raised by `loadConfig` when the environment does not validate. */
export class ConfigError extends Error {
  public readonly name = "ConfigError";

  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super(message);
  }
}
