/**
 * GFM pipe-table helpers.
 */

import type { ColumnAlign } from "./types";
import { extractInlineText } from "./inline";

/**
 * Split a pipe row into trimmed cells.
 * Escaped pipes and pipes inside code spans do not split.
 */
export function splitTableRow(line: string): string[] {
  let row = line.trim();
  if (row.startsWith("|")) row = row.slice(1);
  if (row.endsWith("|") && !row.endsWith("\\|")) row = row.slice(0, -1);

  const cells: string[] = [];
  let current = "";
  let codeRun = 0;

  for (let i = 0; i < row.length; i++) {
    const ch = row[i] ?? "";

    if (ch === "\\" && row[i + 1] === "|") {
      current += "|";
      i++;
      continue;
    }

    if (ch === "`") {
      let end = i;
      while (row[end] === "`") end++;
      const length = end - i;
      if (codeRun === 0) codeRun = length;
      else if (codeRun === length) codeRun = 0;
      current += row.slice(i, end);
      i = end - 1;
      continue;
    }

    if (ch === "|" && codeRun === 0) {
      cells.push(current.trim());
      current = "";
      continue;
    }

    current += ch;
  }

  cells.push(current.trim());
  return cells;
}

const DELIMITER_CELL = /^:?-+:?$/;

export function isDelimiterRow(line: string): boolean {
  if (!line.includes("-")) return false;
  const trimmed = line.trim();
  // A bare "---" is a thematic break or setext underline, not a table
  if (!trimmed.includes("|")) return false;
  const cells = splitTableRow(trimmed);
  return cells.length > 0 && cells.every((cell) => DELIMITER_CELL.test(cell));
}

export function parseAlign(cell: string): ColumnAlign {
  const left = cell.startsWith(":");
  const right = cell.endsWith(":");
  if (left && right) return "center";
  if (right) return "right";
  if (left) return "left";
  return null;
}

export interface ParsedNumber {
  value: number;
  /** Number of digits shown after the decimal point */
  decimals: number;
}

const NUMBER_PATTERN = /^([+\-−]?)(\d{1,3}(?:,\d{3})+|\d+|(?=\.\d))(?:\.(\d+))?$/;

/**
 * Read a numeric table cell.
 * Accepts thousands separators, a trailing %, approximation prefixes (~, ≈)
 * and a multiplier prefix (x, ×). Returns null for anything else.
 */
export function parseNumber(cell: string): ParsedNumber | null {
  let text = extractInlineText(cell).trim();
  text = text.replace(/^[~≈]\s*/, "").replace(/^[x×](?=\d)/, "");
  if (text.endsWith("%")) text = text.slice(0, -1).trimEnd();

  const match = NUMBER_PATTERN.exec(text);
  if (!match) return null;

  const negative = match[1] === "-" || match[1] === "−";
  const whole = (match[2] ?? "").replace(/,/g, "");
  const fraction = match[3] ?? "";
  const value = Number(`${whole || "0"}${fraction ? `.${fraction}` : ""}`);

  if (!Number.isFinite(value)) return null;
  return {
    value: negative ? -value : value,
    decimals: fraction.length,
  };
}

/**
 * Normalize a header cell for case-insensitive column lookup.
 */
export function normalizeHeader(cell: string): string {
  return extractInlineText(cell).replace(/\s+/g, " ").trim().toLowerCase();
}
