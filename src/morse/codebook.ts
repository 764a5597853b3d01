/**
 * The Morse codebook, laid out as an implicit binary tree.
 *
 * Index 1 is the root. Index `n` has its DOT child at `2n`, its DASH child at
 * `2n + 1` and its parent at `n >> 1`, so the code of the letter at `n` is the
 * binary form of `n` with the leading 1 dropped (0 = DOT, 1 = DASH).
 *
 *   `*`  root marker (indices 0 and 1)
 *   `?`  no letter assigned to this path
 */

export const CODEBOOK = "**ETIANMSURWDKGOHVF?L?PJBXCYZQ??";
export const CODEBOOK_LENGTH = CODEBOOK.length;

export const ROOT = 1;
export const ROOT_MARKER = "*";
export const GAP = "?";

/** The letters that have a code, in alphabetical order. */
export const LETTERS = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";

const ROOT_MARKER_CODE = ROOT_MARKER.charCodeAt(0);
const GAP_CODE = GAP.charCodeAt(0);

/** Byte value at a codebook index. */
export function entryAt(index: number): number {
  return CODEBOOK.charCodeAt(index);
}

/** First codebook index holding `byte`, or -1. */
export function indexOf(byte: number): number {
  for (let i = 0; i < CODEBOOK_LENGTH; i++) {
    if (CODEBOOK.charCodeAt(i) === byte) return i;
  }
  return -1;
}

/** True when the slot holds a letter rather than a root or gap marker. */
export function isLetterIndex(index: number): boolean {
  if (!Number.isInteger(index) || index <= ROOT || index >= CODEBOOK_LENGTH) return false;
  const entry = CODEBOOK.charCodeAt(index);
  return entry !== ROOT_MARKER_CODE && entry !== GAP_CODE;
}

export function parentOf(index: number): number {
  return index >> 1;
}

/** Child of `index` along a DOT (`0`) or DASH (`1`) edge. */
export function childOf(index: number, bit: 0 | 1): number {
  return (index << 1) | bit;
}

/** Number of symbols in the code for `index` (floor of log2). */
export function depthOf(index: number): number {
  let depth = 0;
  for (let n = index; n >> 1; n >>= 1) depth++;
  return depth;
}
