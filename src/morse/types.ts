/**
 * Morse Tree Codec: Type Definitions
 *
 * Symbols are handled as byte values so the same code path serves
 * caller-supplied `Uint8Array` buffers and plain strings.
 */

import type { MorseError } from "../errors.js";

// ---------------------------------------------------------------------------
// Symbols
// ---------------------------------------------------------------------------

/** Default short signal, `.`. */
export const DOT = 0x2e;
/** Default long signal, `-`. */
export const DASH = 0x2d;
/** End of a code. Also what every unused buffer slot holds. */
export const TERMINATOR = 0x00;

/** Longest code the tree can describe. */
export const MAX_CODE_LENGTH = 5;
/** Encode buffer size: five symbol slots plus one terminator slot. */
export const CODE_CAPACITY = MAX_CODE_LENGTH + 1;

/** Resolved byte values for the two signals. */
export interface SymbolSet {
  dot: number;
  dash: number;
}

export const DEFAULT_SYMBOLS: Readonly<SymbolSet> = { dot: DOT, dash: DASH };

// ---------------------------------------------------------------------------
// Options / results
// ---------------------------------------------------------------------------

export interface CodecOptions {
  /** Character used for the short signal (default `.`). */
  dot?: string;
  /** Character used for the long signal (default `-`). */
  dash?: string;
}

export type CodecResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: MorseError };

/** Which step of the round trip went wrong. */
export type SelfTestStage = "encode" | "decode" | "mismatch";

export type SelfTestReport =
  | { ok: true; checked: number }
  | {
      ok: false;
      /** Letter under test when the check stopped. */
      letter: string;
      stage: SelfTestStage;
      /** Decoded letter, for a mismatch. */
      decoded?: string;
      error?: MorseError;
    };
