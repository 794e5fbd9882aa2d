/**
 * Citation extraction and standardization
 *
 * Recognised forms (outside code):
 *   [Orkin, 2004]   [Orkin (2004)]   (Orkin, 2004)   (Orkin 2004)
 *   Orkin, "Applying Goal-Oriented Action Planning to Games" (2004)   <- standard
 *
 * Known authors are rewritten to the standard form; unknown ones are kept
 * as written and returned for review. A leading name that is not itself a
 * database author ("See Orkin") is never rewritten. Running twice changes
 * nothing.
 */

import { parseDocument } from "../markdown/parser";
import { mapOutsideInlineCode } from "../markdown/inline";
import { lookupCitation } from "./database";
import { formatCitation, primaryAuthor } from "./format";
import type { Citation, CitationDatabase, CitationEntry, CitationStyle, StandardizeResult } from "./types";

const NAME = String.raw`[A-Z][A-Za-z'-]*`;
const AUTHORS = String.raw`${NAME}(?:(?:\s+|\s*,\s*)(?:${NAME}|&|and)|\s+et\s+al\.?)*`;

const REWRITE_PATTERNS: ReadonlyArray<{ style: CitationStyle; pattern: RegExp }> = [
  // Brackets not followed by "(" or "[" so Markdown links stay intact
  { style: "bracket-comma", pattern: new RegExp(String.raw`\[(${AUTHORS}),\s*(\d{4})\](?![(\[])`, "g") },
  { style: "bracket-paren", pattern: new RegExp(String.raw`\[(${AUTHORS})\s+\((\d{4})\)\](?![(\[])`, "g") },
  { style: "paren-comma", pattern: new RegExp(String.raw`\((${AUTHORS}),\s*(\d{4})\)`, "g") },
  { style: "paren-space", pattern: new RegExp(String.raw`\((${AUTHORS})\s+(\d{4})\)`, "g") },
];

const STANDARD_PATTERN = new RegExp(String.raw`(${AUTHORS}),\s*"([^"]+)"\s+\((\d{4})\)`, "g");

// "(January 2024)" is a date, not a citation
const MONTHS = new Set([
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
]);

/**
 * First author as written, before any co-author separator.
 */
export function leadingName(authorPart: string): string {
  return (authorPart.trim().split(/\s*(?:,|&|\band\b|\bet\s+al\b)\s*/)[0] ?? "").trim();
}

function isDate(authorPart: string): boolean {
  return MONTHS.has((leadingName(authorPart).split(/\s+/)[0] ?? "").toLowerCase());
}

/**
 * Database entry for an author part. A multi-word leading name must be a
 * key itself ("Van Vliet"); a single word goes through the usual lookup.
 */
function resolveAuthor(db: CitationDatabase, authorPart: string): { key: string; entry: CitationEntry } | null {
  const lead = leadingName(authorPart);
  if (!/\s/.test(lead)) return lookupCitation(db, primaryAuthor(authorPart));

  const lowered = lead.toLowerCase();
  for (const [key, entry] of db.entries) {
    if (key.toLowerCase() === lowered) return { key, entry };
  }
  return null;
}

function processCitations(source: string, db: CitationDatabase | null): StandardizeResult {
  const lines = source.split("\n");
  const { codeLines } = parseDocument("", source);
  const updated: Citation[] = [];
  const unchanged: Citation[] = [];
  const review: Citation[] = [];

  const output = lines.map((line, i) => {
    const lineNumber = i + 1;
    if (codeLines.has(lineNumber)) return line;

    return mapOutsideInlineCode(line, (text) => {
      for (const match of text.matchAll(STANDARD_PATTERN)) {
        const author = primaryAuthor(match[1] ?? "");
        const found = db ? resolveAuthor(db, match[1] ?? "") : null;
        unchanged.push({
          raw: match[0],
          style: "standard",
          author,
          year: match[3] ?? "",
          line: lineNumber,
          standard: match[0],
          key: found?.key ?? null,
        });
      }

      let result = text;
      for (const { style, pattern } of REWRITE_PATTERNS) {
        result = result.replace(pattern, (raw: string, authorPart: string, year: string) => {
          if (isDate(authorPart)) return raw;
          const author = primaryAuthor(authorPart);
          const found = db ? resolveAuthor(db, authorPart) : null;
          const citation: Citation = {
            raw,
            style,
            author,
            year,
            line: lineNumber,
            standard: found ? formatCitation(found.key, found.entry) : null,
            key: found?.key ?? null,
          };

          if (citation.standard === null) {
            review.push(citation);
            return raw;
          }
          updated.push(citation);
          return citation.standard;
        });
      }
      return result;
    });
  });

  const byPosition = (a: Citation, b: Citation): number => a.line - b.line;
  return {
    content: output.join("\n"),
    updated: updated.sort(byPosition),
    unchanged: unchanged.sort(byPosition),
    review: review.sort(byPosition),
  };
}

/**
 * Every citation in a document, in line order, without database lookups.
 */
export function extractCitations(source: string): Citation[] {
  const { unchanged, review } = processCitations(source, null);
  return [...unchanged, ...review].sort((a, b) => a.line - b.line);
}

export function standardizeCitations(source: string, db: CitationDatabase): StandardizeResult {
  return processCitations(source, db);
}
