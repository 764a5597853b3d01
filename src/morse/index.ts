/**
 * Morse Tree Codec
 *
 * Single-letter Morse encoding and decoding over a 32-slot codebook that is
 * also a binary tree: index arithmetic replaces node pointers.
 *
 * @example
 * ```ts
 * import { encode, decode, unwrap } from "./morse";
 *
 * unwrap(encode("A"));   // ".-"
 * unwrap(decode("..."));  // "S"
 * decode("..--");         // { ok: true, value: "?" }, no letter on that path
 * decode(".X.");          // { ok: false, error: MorseError { kind: "InvalidCharacter" } }
 * ```
 */

export {
  type CodecOptions,
  type CodecResult,
  type SymbolSet,
  type SelfTestReport,
  type SelfTestStage,
  DOT,
  DASH,
  TERMINATOR,
  MAX_CODE_LENGTH,
  CODE_CAPACITY,
  DEFAULT_SYMBOLS,
} from "./types.js";

export {
  CODEBOOK,
  CODEBOOK_LENGTH,
  ROOT,
  ROOT_MARKER,
  GAP,
  LETTERS,
  entryAt,
  indexOf,
  isLetterIndex,
  parentOf,
  childOf,
  depthOf,
} from "./codebook.js";

export { encode, decode, encodeInto, decodeFrom, resolveSymbols, unwrap } from "./codec.js";

export { selfTest } from "./selftest.js";

export { renderTable, renderTree, renderUsage } from "./chart.js";
