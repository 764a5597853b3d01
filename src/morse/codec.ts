/**
 * Morse Tree Codec
 *
 * Encodes one letter to its Morse code and decodes one code back to a letter
 * by walking the implicit tree in `codebook.ts`.
 *
 * Two layers share the same walk:
 *
 *   encodeInto / decodeFrom   byte level, caller-supplied Uint8Array
 *   encode / decode           string level
 *
 * Failures are returned as `{ ok: false, error }`, never thrown. Only misuse
 * (a buffer that is too small, a bad offset, a bad symbol override) throws a
 * RangeError.
 */

import { invalidCharacter, invalidSymbol } from "../errors.js";
import {
  CODEBOOK_LENGTH,
  GAP,
  ROOT,
  childOf,
  entryAt,
  indexOf,
  isLetterIndex,
  parentOf,
} from "./codebook.js";
import {
  type CodecOptions,
  type CodecResult,
  type SymbolSet,
  CODE_CAPACITY,
  DEFAULT_SYMBOLS,
  TERMINATOR,
} from "./types.js";

const GAP_CODE = GAP.charCodeAt(0);

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** Resolve `CodecOptions` to byte values. Throws RangeError on a bad override. */
export function resolveSymbols(opts: CodecOptions = {}): SymbolSet {
  if (opts.dot === undefined && opts.dash === undefined) return DEFAULT_SYMBOLS;
  const dot = opts.dot === undefined ? DEFAULT_SYMBOLS.dot : symbolByte("dot", opts.dot);
  const dash = opts.dash === undefined ? DEFAULT_SYMBOLS.dash : symbolByte("dash", opts.dash);
  if (dot === dash) {
    throw new RangeError("dot and dash must be different characters");
  }
  return { dot, dash };
}

function symbolByte(name: string, value: string): number {
  if (value.length !== 1) {
    throw new RangeError(`${name} must be a single character, got ${JSON.stringify(value)}`);
  }
  const code = value.charCodeAt(0);
  if (code === TERMINATOR || code > 0xff) {
    throw new RangeError(`${name} must be a character between 0x01 and 0xff`);
  }
  return code;
}

// ---------------------------------------------------------------------------
// Encode
// ---------------------------------------------------------------------------

/**
 * Encode the letter with byte value `letter` into `out`.
 *
 * All `CODE_CAPACITY` slots are zeroed first, so whatever follows the code is
 * the terminator, including after a failure. The value of a successful result
 * is the code length.
 */
export function encodeInto(
  letter: number,
  out: Uint8Array,
  symbols: SymbolSet = DEFAULT_SYMBOLS,
): CodecResult<number> {
  if (out.length < CODE_CAPACITY) {
    throw new RangeError(`Output buffer needs ${CODE_CAPACITY} bytes, got ${out.length}`);
  }
  out.fill(TERMINATOR, 0, CODE_CAPACITY);

  let pos = indexOf(letter);
  if (!isLetterIndex(pos)) {
    return { ok: false, error: invalidSymbol(String.fromCharCode(letter)) };
  }

  // Leaf to root: each halving drops the bit that chose this branch.
  let len = 0;
  for (let next = parentOf(pos); next; next = parentOf(pos)) {
    out[len++] = pos & 1 ? symbols.dash : symbols.dot;
    pos = next;
  }
  reverse(out, len);

  return { ok: true, value: len };
}

/** Encode a single character to its Morse code string. */
export function encode(letter: string, opts?: CodecOptions): CodecResult<string> {
  const symbols = resolveSymbols(opts);
  if (letter.length !== 1) {
    return { ok: false, error: invalidSymbol(letter) };
  }

  const buf = new Uint8Array(CODE_CAPACITY);
  const result = encodeInto(letter.charCodeAt(0), buf, symbols);
  if (!result.ok) {
    // Report the character as given; it may lie above 0xff.
    return { ok: false, error: invalidSymbol(letter) };
  }
  return { ok: true, value: String.fromCharCode(...buf.subarray(0, result.value)) };
}

/** In-place reversal of the first `length` slots. */
function reverse(buf: Uint8Array, length: number): void {
  for (let i = 0, j = length - 1; i < j; i++, j--) {
    const t = buf[i];
    buf[i] = buf[j];
    buf[j] = t;
  }
}

// ---------------------------------------------------------------------------
// Decode
// ---------------------------------------------------------------------------

/**
 * Walk the tree from the root. `read(i)` returns the i-th symbol, or the
 * terminator past the end of the input.
 *
 * The walk stops once the index leaves the table (five symbols with no
 * terminator); the rest of the input is not looked at and the result is `?`.
 */
function walk(
  read: (i: number) => number,
  symbols: SymbolSet,
  symbolAt: (i: number) => string,
): CodecResult<number> {
  let n = ROOT;
  for (let i = 0; n < CODEBOOK_LENGTH; i++) {
    const ch = read(i);
    if (ch === symbols.dot) {
      n = childOf(n, 0);
    } else if (ch === symbols.dash) {
      n = childOf(n, 1);
    } else if (ch === TERMINATOR) {
      return { ok: true, value: n === ROOT ? GAP_CODE : entryAt(n) };
    } else {
      return { ok: false, error: invalidCharacter(symbolAt(i), i) };
    }
  }
  return { ok: true, value: GAP_CODE };
}

/**
 * Decode the code starting at `offset` in `input`. The code ends at a
 * terminator byte or at the end of the array. The value of a successful result
 * is the byte value of the decoded letter (`?` when no letter is assigned).
 * Error positions are relative to `offset`.
 */
export function decodeFrom(
  input: Uint8Array,
  offset = 0,
  symbols: SymbolSet = DEFAULT_SYMBOLS,
): CodecResult<number> {
  if (!Number.isInteger(offset) || offset < 0) {
    throw new RangeError(`Offset must be a non-negative integer, got ${offset}`);
  }
  const read = (i: number): number => {
    const at = offset + i;
    return at < input.length ? input[at] : TERMINATOR;
  };
  return walk(read, symbols, (i) => String.fromCharCode(read(i)));
}

/**
 * Decode one Morse code string to a letter. The end of the string, or a NUL
 * character, terminates the code. Multi-letter input is not split: callers
 * pass one code per call.
 */
export function decode(code: string, opts?: CodecOptions): CodecResult<string> {
  const symbols = resolveSymbols(opts);
  const read = (i: number): number => (i < code.length ? code.charCodeAt(i) : TERMINATOR);
  const result = walk(read, symbols, (i) => code.charAt(i));
  if (!result.ok) return result;
  return { ok: true, value: String.fromCharCode(result.value) };
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

/** Return the value of a successful result, or throw its MorseError. */
export function unwrap<T>(result: CodecResult<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
