/**
 * Index rules: every file listed in the index exists, and every guide is listed.
 */

import { posix } from "node:path";
import type { GuideDocument } from "../markdown/types";
import { maskInlineCode, splitInlineCode } from "../markdown/inline";
import { splitTableRow } from "../markdown/tables";
import type { GuideRule, RuleFinding } from "./types";
import { isMarkdownPath, resolveLinkPath } from "./paths";

export interface IndexEntry {
  /** File name as written in the index */
  name: string;
  /** Root-relative path the entry resolves to */
  path: string;
  line: number;
}

const FILE_TOKEN = /(?:^|[\s(])((?:[\w.-]+\/)*[\w][\w.-]*\.md)(?=$|[\s),.;:])/g;
const LINK_SYNTAX = /!?\[[^\]]*\]\([^)]*\)/g;

/**
 * Collect file references from an index document.
 *
 * Recognised forms: Markdown links to `.md` files, backticked file names,
 * and bare file names inside table cells. Each path is reported once.
 */
export function extractIndexEntries(index: GuideDocument): IndexEntry[] {
  const candidates: Array<{ name: string; line: number }> = [];

  for (const link of index.links) {
    if (!link.external && link.path && isMarkdownPath(link.path)) {
      candidates.push({ name: link.path, line: link.line });
    }
  }

  const tableLines = new Set<number>();
  for (const table of index.tables) {
    for (const row of table.rows) tableLines.add(row.line);
  }

  index.lines.forEach((line, i) => {
    const lineNumber = i + 1;
    if (index.codeLines.has(lineNumber)) return;

    for (const segment of splitInlineCode(line)) {
      if (!segment.code) continue;
      const name = segment.text.replace(/^`+\s*/, "").replace(/\s*`+$/, "");
      if (/^[^\s`]+\.md$/i.test(name)) candidates.push({ name, line: lineNumber });
    }

    if (tableLines.has(lineNumber)) {
      for (const cell of splitTableRow(maskInlineCode(line))) {
        const text = cell.replace(LINK_SYNTAX, " ");
        for (const match of text.matchAll(FILE_TOKEN)) {
          if (match[1]) candidates.push({ name: match[1], line: lineNumber });
        }
      }
    }
  });

  const seen = new Map<string, IndexEntry>();
  for (const candidate of candidates.sort((a, b) => a.line - b.line)) {
    const path = resolveLinkPath(index.path, candidate.name);
    if (path === index.path || seen.has(path)) continue;
    seen.set(path, { name: candidate.name, path, line: candidate.line });
  }
  return [...seen.values()];
}

export const indexEntriesRule: GuideRule = {
  id: "index-entries",
  description: "Every file listed in the guide index exists",
  defaultSeverity: "error",
  check({ set }) {
    if (!set.index) {
      return [{ file: set.indexPath, line: 0, message: `Index file ${set.indexPath} not found` }];
    }

    const findings: RuleFinding[] = [];
    for (const entry of extractIndexEntries(set.index)) {
      if (!set.fileExists(entry.path)) {
        findings.push({
          file: set.index.path,
          line: entry.line,
          message: `Listed guide ${entry.name} does not exist`,
        });
      }
    }
    return findings;
  },
};

export const indexOrphansRule: GuideRule = {
  id: "index-orphans",
  description: "Every guide in the directory is listed in the guide index",
  defaultSeverity: "warning",
  check({ set }) {
    if (!set.index) return [];

    const listed = new Set(extractIndexEntries(set.index).map((entry) => entry.path));
    const findings: RuleFinding[] = [];
    for (const path of set.documents.keys()) {
      if (path === set.indexPath || listed.has(path)) continue;
      findings.push({
        file: path,
        line: 0,
        message: `Guide is not listed in ${posix.basename(set.indexPath)}`,
      });
    }
    return findings;
  },
};
