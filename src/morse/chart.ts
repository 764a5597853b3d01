/**
 * Text charts of the codebook: a two-column letter table and the tree
 * diagram, both generated from `CODEBOOK` rather than written out by hand.
 */

import { CODEBOOK, CODEBOOK_LENGTH, LETTERS, ROOT, childOf, depthOf } from "./codebook.js";
import { encode, unwrap } from "./codec.js";
import { type CodecOptions, MAX_CODE_LENGTH } from "./types.js";

// ---------------------------------------------------------------------------
// Table
// ---------------------------------------------------------------------------

/**
 * Letters A..M beside N..Z, one pair per line:
 *
 *   `  A    .-  N    -.`
 */
export function renderTable(opts?: CodecOptions): string[] {
  const half = LETTERS.length / 2;
  const lines: string[] = [];
  for (let i = 0; i < half; i++) {
    const left = LETTERS[i];
    const right = LETTERS[i + half];
    lines.push(`  ${cell(left, opts)}  ${cell(right, opts)}`);
  }
  return lines;
}

function cell(letter: string, opts?: CodecOptions): string {
  return `${letter} ${unwrap(encode(letter, opts)).padStart(MAX_CODE_LENGTH)}`;
}

// ---------------------------------------------------------------------------
// Tree
// ---------------------------------------------------------------------------

/** Columns between neighbouring leaves. */
const LEAF_SPACING = 4;
/** Depth of the deepest row that holds letters. */
const LEAF_DEPTH = 4;

/** Column of node `index`: the middle of the leaves below it. */
function columnOf(index: number): number {
  const depth = depthOf(index);
  const span = 1 << (LEAF_DEPTH - depth);
  const first = (index - (ROOT << depth)) * span;
  const last = first + span - 1;
  return ((first + last) * LEAF_SPACING) / 2;
}

/**
 * The codebook drawn as a tree, DOT branches to the left and DASH branches to
 * the right. Node rows alternate with edge rows; trailing spaces are trimmed.
 */
export function renderTree(): string[] {
  const width = (1 << LEAF_DEPTH) * LEAF_SPACING;
  const rows = Array.from({ length: LEAF_DEPTH + 1 }, () => ({
    nodes: Array<string>(width).fill(" "),
    edges: Array<string>(width).fill(" "),
  }));

  for (let n = ROOT; n < CODEBOOK_LENGTH; n++) {
    const depth = depthOf(n);
    const col = columnOf(n);
    rows[depth].nodes[col] = CODEBOOK[n];
    if (depth < LEAF_DEPTH) {
      rows[depth].edges[(col + columnOf(childOf(n, 0))) / 2] = "/";
      rows[depth].edges[(col + columnOf(childOf(n, 1))) / 2] = "\\";
    }
  }

  return rows.flatMap(({ nodes, edges }, depth) => {
    const line = nodes.join("").trimEnd();
    return depth < LEAF_DEPTH ? [line, edges.join("").trimEnd()] : [line];
  });
}

// ---------------------------------------------------------------------------
// Usage
// ---------------------------------------------------------------------------

export function renderUsage(scriptName: string): string {
  return [
    `Usage: ${scriptName} <command> [args..]`,
    "",
    "Commands:",
    `  ${scriptName} encode <words..>   letters to Morse code, one line per word`,
    `  ${scriptName} decode <codes..>   one Morse code per argument to letters`,
    `  ${scriptName} table              the codebook as a table`,
    `  ${scriptName} tree               the codebook as a tree`,
    "",
    "Options:",
    "  --dot <char>    character for the short signal (default '.')",
    "  --dash <char>   character for the long signal (default '-')",
    "  --verbose       log debug output to stderr",
    "",
    "Only the upper case letters A-Z have codes.",
    "",
    "Characters:",
    "",
    ...renderTable(),
    "",
    "Tree:",
    "",
    ...renderTree(),
    "",
  ].join("\n");
}
