import { describe, it, expect } from "vitest";
import { decode, decodeFrom, encode, encodeInto, resolveSymbols, unwrap } from "../../src/morse/codec.js";
import { CODE_CAPACITY, DASH, DOT } from "../../src/morse/types.js";
import { MorseError } from "../../src/errors.js";

// International Morse, letters only.
const MORSE: Record<string, string> = {
  A: ".-", B: "-...", C: "-.-.", D: "-..", E: ".", F: "..-.", G: "--.",
  H: "....", I: "..", J: ".---", K: "-.-", L: ".-..", M: "--", N: "-.",
  O: "---", P: ".--.", Q: "--.-", R: ".-.", S: "...", T: "-", U: "..-",
  V: "...-", W: ".--", X: "-..-", Y: "-.--", Z: "--..",
};

const byte = (ch: string) => ch.charCodeAt(0);

// ---------------------------------------------------------------------------
// encode
// ---------------------------------------------------------------------------

describe("encode", () => {
  it("encodes the basic vectors", () => {
    expect(encode("A")).toEqual({ ok: true, value: ".-" });
    expect(encode("E")).toEqual({ ok: true, value: "." });
    expect(encode("T")).toEqual({ ok: true, value: "-" });
    expect(encode("S")).toEqual({ ok: true, value: "..." });
    expect(encode("O")).toEqual({ ok: true, value: "---" });
  });

  it("matches international Morse for every letter", () => {
    for (const [letter, morse] of Object.entries(MORSE)) {
      expect(unwrap(encode(letter))).toBe(morse);
    }
  });

  it("rejects characters without a code", () => {
    for (const ch of ["1", "*", "?", "a", " ", "\0", "É"]) {
      const result = encode(ch);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(MorseError);
        expect(result.error.kind).toBe("InvalidSymbol");
        expect(result.error.symbol).toBe(ch);
      }
    }
  });

  it("rejects input that is not a single character", () => {
    const empty = encode("");
    const pair = encode("AB");
    expect(empty.ok).toBe(false);
    expect(pair.ok).toBe(false);
    if (!empty.ok) expect(empty.error.message).toBe("No Morse code for empty input");
    if (!pair.ok) expect(pair.error.message).toBe('No Morse code for "AB"');
  });

  it("describes control characters by code point", () => {
    const result = encode("\0");
    if (result.ok) throw new Error("expected failure");
    expect(result.error.message).toBe("No Morse code for 0x00");
  });

  it("uses overridden dot and dash characters", () => {
    expect(unwrap(encode("A", { dot: "o", dash: "x" }))).toBe("ox");
    expect(unwrap(encode("B", { dash: "_" }))).toBe("_...");
  });
});

// ---------------------------------------------------------------------------
// encodeInto
// ---------------------------------------------------------------------------

describe("encodeInto", () => {
  it("writes the code and returns its length", () => {
    const buf = new Uint8Array(CODE_CAPACITY);
    expect(encodeInto(byte("Q"), buf)).toEqual({ ok: true, value: 4 });
    expect([...buf]).toEqual([DASH, DASH, DOT, DASH, 0, 0]);
  });

  it("zero-fills the unused tail", () => {
    const buf = new Uint8Array(CODE_CAPACITY).fill(0xff);
    encodeInto(byte("E"), buf);
    expect([...buf]).toEqual([DOT, 0, 0, 0, 0, 0]);
  });

  it("leaves a zeroed buffer after a failure", () => {
    const buf = new Uint8Array(CODE_CAPACITY).fill(0xff);
    const result = encodeInto(byte("?"), buf);
    expect(result.ok).toBe(false);
    expect([...buf]).toEqual([0, 0, 0, 0, 0, 0]);
  });

  it("only touches the first six slots of a larger buffer", () => {
    const buf = new Uint8Array(8).fill(0xaa);
    encodeInto(byte("T"), buf);
    expect([...buf]).toEqual([DASH, 0, 0, 0, 0, 0, 0xaa, 0xaa]);
  });

  it("throws on a buffer that is too small", () => {
    expect(() => encodeInto(byte("A"), new Uint8Array(5))).toThrow(RangeError);
  });

  it("returns code lengths equal to the tree depth", () => {
    const buf = new Uint8Array(CODE_CAPACITY);
    const lengths = Object.keys(MORSE).map((l) => unwrap(encodeInto(byte(l), buf)));
    expect(lengths).toEqual(Object.values(MORSE).map((m) => m.length));
  });
});

// ---------------------------------------------------------------------------
// decode
// ---------------------------------------------------------------------------

describe("decode", () => {
  it("decodes known codes", () => {
    expect(decode(".-")).toEqual({ ok: true, value: "A" });
    expect(decode("-...")).toEqual({ ok: true, value: "B" });
    expect(decode("--.-")).toEqual({ ok: true, value: "Q" });
  });

  it("round-trips every letter", () => {
    for (const letter of Object.keys(MORSE)) {
      expect(unwrap(decode(unwrap(encode(letter))))).toBe(letter);
    }
  });

  it("returns ? for paths with no letter", () => {
    expect(decode("..--")).toEqual({ ok: true, value: "?" });
    expect(decode(".-.-")).toEqual({ ok: true, value: "?" });
    expect(decode("----")).toEqual({ ok: true, value: "?" });
  });

  it("returns ? for the empty code", () => {
    expect(decode("")).toEqual({ ok: true, value: "?" });
  });

  it("returns ? for codes of five or more symbols", () => {
    expect(decode(".....")).toEqual({ ok: true, value: "?" });
    expect(decode("-----")).toEqual({ ok: true, value: "?" });
    expect(decode("..........")).toEqual({ ok: true, value: "?" });
  });

  it("stops reading once the code is too long", () => {
    expect(decode(".....X")).toEqual({ ok: true, value: "?" });
  });

  it("stops at an embedded NUL", () => {
    expect(decode(".-\0garbage")).toEqual({ ok: true, value: "A" });
  });

  it("rejects symbols other than dot and dash", () => {
    const result = decode(".X.");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("InvalidCharacter");
      expect(result.error.symbol).toBe("X");
      expect(result.error.position).toBe(1);
      expect(result.error.message).toBe('Invalid Morse symbol "X" at position 1');
    }
  });

  it("treats spaces as invalid symbols", () => {
    const result = decode(". -");
    if (result.ok) throw new Error("expected failure");
    expect(result.error.symbol).toBe(" ");
    expect(result.error.position).toBe(1);
  });

  it("does not split multi-letter input", () => {
    // "...-" lands on V; the next dash leaves the table.
    expect(decode("...---...")).toEqual({ ok: true, value: "?" });
    const letters = "... --- ...".split(" ").map((c) => unwrap(decode(c)));
    expect(letters.join("")).toBe("SOS");
  });

  it("uses overridden dot and dash characters", () => {
    expect(unwrap(decode("ox", { dot: "o", dash: "x" }))).toBe("A");
    const result = decode(".-", { dot: "o", dash: "x" });
    if (result.ok) throw new Error("expected failure");
    expect(result.error.symbol).toBe(".");
    expect(result.error.position).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// decodeFrom
// ---------------------------------------------------------------------------

describe("decodeFrom", () => {
  it("decodes an encodeInto buffer", () => {
    const buf = new Uint8Array(CODE_CAPACITY);
    encodeInto(byte("J"), buf);
    expect(decodeFrom(buf)).toEqual({ ok: true, value: byte("J") });
  });

  it("treats the end of the array as the terminator", () => {
    expect(decodeFrom(Uint8Array.of(DASH, DASH))).toEqual({ ok: true, value: byte("M") });
  });

  it("starts at the given offset", () => {
    const input = Uint8Array.of(DOT, DASH, 0, DASH, DOT, DOT, DOT, 0);
    expect(decodeFrom(input, 0)).toEqual({ ok: true, value: byte("A") });
    expect(decodeFrom(input, 3)).toEqual({ ok: true, value: byte("B") });
  });

  it("reports invalid bytes relative to the offset", () => {
    const result = decodeFrom(Uint8Array.of(0, DOT, 0x58), 1);
    if (result.ok) throw new Error("expected failure");
    expect(result.error.kind).toBe("InvalidCharacter");
    expect(result.error.symbol).toBe("X");
    expect(result.error.position).toBe(1);
  });
});

describe("decodeFrom offsets", () => {
  it("throws on a negative or fractional offset", () => {
    const input = Uint8Array.of(DOT, DASH);
    expect(() => decodeFrom(input, -1)).toThrow(RangeError);
    expect(() => decodeFrom(input, 0.5)).toThrow("Offset must be a non-negative integer, got 0.5");
  });

  it("reads an offset at the end of the array as the empty code", () => {
    expect(decodeFrom(Uint8Array.of(DOT), 1)).toEqual({ ok: true, value: "?".charCodeAt(0) });
  });
});

// ---------------------------------------------------------------------------
// Options / results
// ---------------------------------------------------------------------------

describe("resolveSymbols", () => {
  it("returns the defaults without overrides", () => {
    expect(resolveSymbols()).toEqual({ dot: DOT, dash: DASH });
    expect(resolveSymbols({})).toEqual({ dot: DOT, dash: DASH });
  });

  it("resolves overrides to byte values", () => {
    expect(resolveSymbols({ dot: "o", dash: "x" })).toEqual({ dot: 0x6f, dash: 0x78 });
  });

  it("throws on invalid overrides", () => {
    expect(() => resolveSymbols({ dot: "-" })).toThrow(/different/);
    expect(() => resolveSymbols({ dot: "ab" })).toThrow(/single character/);
    expect(() => resolveSymbols({ dash: "" })).toThrow(/single character/);
    expect(() => resolveSymbols({ dot: "\0" })).toThrow(RangeError);
    expect(() => resolveSymbols({ dash: "—" })).toThrow(RangeError);
  });

  it("is applied before encoding and decoding", () => {
    expect(() => encode("A", { dot: "x", dash: "x" })).toThrow(RangeError);
    expect(() => decode(".", { dot: "xx" })).toThrow(RangeError);
  });
});

describe("unwrap", () => {
  it("returns the value of a success", () => {
    expect(unwrap(encode("E"))).toBe(".");
  });

  it("throws the carried error", () => {
    expect(() => unwrap(encode("1"))).toThrow(MorseError);
    expect(() => unwrap(decode("-_"))).toThrow('Invalid Morse symbol "_" at position 1');
  });
});
