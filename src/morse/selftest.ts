import { LETTERS } from "./codebook.js";
import { decodeFrom, encodeInto } from "./codec.js";
import { type SelfTestReport, CODE_CAPACITY } from "./types.js";

/**
 * Round-trip every letter A..Z through the byte-level codec.
 * Stops at the first letter that fails and reports which step broke.
 */
export function selfTest(): SelfTestReport {
  const buf = new Uint8Array(CODE_CAPACITY);

  for (const letter of LETTERS) {
    const byte = letter.charCodeAt(0);

    const encoded = encodeInto(byte, buf);
    if (!encoded.ok) return { ok: false, letter, stage: "encode", error: encoded.error };

    const decoded = decodeFrom(buf);
    if (!decoded.ok) return { ok: false, letter, stage: "decode", error: decoded.error };

    if (decoded.value !== byte) {
      return { ok: false, letter, stage: "mismatch", decoded: String.fromCharCode(decoded.value) };
    }
  }

  return { ok: true, checked: LETTERS.length };
}
