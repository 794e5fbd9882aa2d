/**
 * Guide Markdown Parser
 *
 * Scans a Markdown file line by line into a GuideDocument: headings, fenced
 * code blocks, pipe tables, links and anchors. Problems that make the file
 * malformed are collected as structural issues; parsing never throws.
 *
 * Passes:
 * 1. Front matter and fenced code (everything inside is opaque)
 * 2. Link reference definitions
 * 3. Headings, tables, links and HTML anchors
 */

import { posix } from "node:path";
import type {
  CodeBlock,
  GuideDocument,
  Heading,
  MarkdownLink,
  MarkdownTable,
  StructuralIssue,
  TableRow,
} from "./types";
import { Slugger } from "./slug";
import { extractInlineText, maskInlineCode } from "./inline";
import { isDelimiterRow, parseAlign, splitTableRow } from "./tables";
import { extractLinks, parseDefinition } from "./links";

const FENCE_OPEN = /^ {0,3}(`{3,}|~{3,})(.*)$/;
const ATX_HEADING = /^ {0,3}(#{1,6})(?:[ \t]+(.*?))?[ \t]*$/;
const ATX_NO_SPACE = /^ {0,3}#{1,6}[^#\s]/;
const SETEXT_H1 = /^ {0,3}=+[ \t]*$/;
const SETEXT_H2 = /^ {0,3}-+[ \t]*$/;
const HTML_ANCHOR = /<a\s[^>]*\bname\s*=\s*["']([^"']+)["']/gi;
const HTML_ID = /<[A-Za-z][^>]*\bid\s*=\s*["']([^"']+)["']/gi;
const BLOCK_START = /^ {0,3}(?:>|[-*+][ \t]|\d{1,9}[.)][ \t]|\||<|#)/;

export function parseDocument(path: string, source: string): GuideDocument {
  const lines = source.split("\n").map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
  const issues: StructuralIssue[] = [];
  const codeLines = new Set<number>();

  const codeBlocks = scanOpaqueRegions(lines, codeLines, issues);
  const definitions = collectDefinitions(lines, codeLines);

  const headings: Heading[] = [];
  const tables: MarkdownTable[] = [];
  const links: MarkdownLink[] = [];
  const anchors = new Set<string>();
  const slugger = new Slugger();

  for (let i = 0; i < lines.length; i++) {
    const lineNumber = i + 1;
    if (codeLines.has(lineNumber)) continue;
    const line = lines[i] ?? "";

    // Tables first: a header row followed by a delimiter row
    const next = lines[i + 1];
    if (line.includes("|") && next !== undefined && !codeLines.has(lineNumber + 1) && isDelimiterRow(next)) {
      const table = readTable(lines, i, codeLines, issues);
      if (table) {
        tables.push(table.table);
        for (let j = i; j < table.endIndex; j++) {
          collectLinks(lines[j] ?? "", j + 1, definitions, links, issues);
        }
        i = table.endIndex - 1;
        continue;
      }
    }

    const atx = ATX_HEADING.exec(line);
    if (atx) {
      const text = stripClosingSequence(atx[2] ?? "");
      if (!text) {
        issues.push({ kind: "empty-heading", line: lineNumber, message: "Heading has no text" });
        continue;
      }
      addHeading(headings, anchors, slugger, (atx[1] ?? "#").length, text, lineNumber, "atx");
      collectLinks(line, lineNumber, definitions, links, issues);
      collectHtmlAnchors(line, anchors);
      continue;
    }

    if (ATX_NO_SPACE.test(line)) {
      issues.push({
        kind: "heading-missing-space",
        line: lineNumber,
        message: `Missing space after '#' in "${line.trim().slice(0, 40)}"`,
      });
    }

    if (next !== undefined && !codeLines.has(lineNumber + 1) && isParagraphLine(line, lines[i - 1])) {
      const level = SETEXT_H1.test(next) ? 1 : SETEXT_H2.test(next) ? 2 : 0;
      if (level > 0) {
        addHeading(headings, anchors, slugger, level, line.trim(), lineNumber, "setext");
        collectLinks(line, lineNumber, definitions, links, issues);
        collectHtmlAnchors(line, anchors);
        i++;
        continue;
      }
    }

    collectLinks(line, lineNumber, definitions, links, issues);
    collectHtmlAnchors(line, anchors);
  }

  const h1 = headings.find((heading) => heading.level === 1);

  return {
    path,
    name: posix.basename(path),
    lines,
    title: h1 ? extractInlineText(h1.text) : null,
    headings,
    tables,
    links,
    codeBlocks,
    anchors,
    codeLines,
    issues: issues.sort((a, b) => a.line - b.line),
  };
}

// ---- Pass 1: front matter and fences ----

function scanOpaqueRegions(lines: string[], codeLines: Set<number>, issues: StructuralIssue[]): CodeBlock[] {
  const blocks: CodeBlock[] = [];
  let start = 0;

  // YAML front matter at the very top
  if (lines[0] === "---") {
    const close = lines.findIndex((line, index) => index > 0 && (line === "---" || line === "..."));
    if (close > 0) {
      for (let i = 0; i <= close; i++) codeLines.add(i + 1);
      start = close + 1;
    }
  }

  for (let i = start; i < lines.length; i++) {
    const open = FENCE_OPEN.exec(lines[i] ?? "");
    if (!open) continue;

    const fence = open[1] ?? "```";
    const info = (open[2] ?? "").trim();
    // Backtick fences may not carry backticks in the info string
    if (fence.startsWith("`") && info.includes("`")) continue;

    const fenceChar = fence.charAt(0);
    const closePattern = new RegExp(`^ {0,3}${fenceChar === "`" ? "`" : "~"}{${fence.length},}[ \\t]*$`);

    let end: number | null = null;
    for (let j = i + 1; j < lines.length; j++) {
      if (closePattern.test(lines[j] ?? "")) {
        end = j;
        break;
      }
    }

    const last = end ?? lines.length - 1;
    for (let k = i; k <= last; k++) codeLines.add(k + 1);

    blocks.push({ fence, info, startLine: i + 1, endLine: end === null ? null : end + 1 });

    if (end === null) {
      issues.push({
        kind: "unclosed-fence",
        line: i + 1,
        message: `Code fence ${fence} opened here is never closed`,
      });
      break;
    }
    i = end;
  }

  return blocks;
}

// ---- Pass 2: reference definitions ----

function collectDefinitions(lines: string[], codeLines: Set<number>): Map<string, string> {
  const definitions = new Map<string, string>();
  lines.forEach((line, index) => {
    if (codeLines.has(index + 1)) return;
    const definition = parseDefinition(line);
    // First definition wins
    if (definition && !definitions.has(definition.label)) {
      definitions.set(definition.label, definition.target);
    }
  });
  return definitions;
}

// ---- Pass 3 helpers ----

function readTable(
  lines: string[],
  headerIndex: number,
  codeLines: Set<number>,
  issues: StructuralIssue[]
): { table: MarkdownTable; endIndex: number } | null {
  const header = splitTableRow(lines[headerIndex] ?? "");
  const delimiter = splitTableRow(lines[headerIndex + 1] ?? "");

  if (header.length !== delimiter.length) {
    issues.push({
      kind: "table-delimiter-mismatch",
      line: headerIndex + 1,
      message: `Table header has ${header.length} columns but the delimiter row has ${delimiter.length}`,
    });
    return null;
  }

  const rows: TableRow[] = [];
  let j = headerIndex + 2;
  for (; j < lines.length; j++) {
    const line = lines[j] ?? "";
    if (codeLines.has(j + 1) || !line.trim() || !line.includes("|")) break;

    const cells = splitTableRow(line);
    if (cells.length !== header.length) {
      issues.push({
        kind: "table-column-mismatch",
        line: j + 1,
        message: `Table row has ${cells.length} cells, header has ${header.length}`,
      });
    }
    rows.push({ line: j + 1, cells });
  }

  return {
    table: {
      line: headerIndex + 1,
      header,
      align: delimiter.map(parseAlign),
      rows,
    },
    endIndex: j,
  };
}

function stripClosingSequence(text: string): string {
  return text.replace(/(?:^|[ \t]+)#+[ \t]*$/, "").trim();
}

function isParagraphLine(line: string, previous: string | undefined): boolean {
  if (!line.trim()) return false;
  if (BLOCK_START.test(line)) return false;
  if (/^ {4,}/.test(line)) return false;
  // Only the first line of a paragraph is considered; multi-line setext
  // headings are rare in guides and would otherwise swallow list items.
  return previous === undefined || !previous.trim() || ATX_HEADING.test(previous);
}

function addHeading(
  headings: Heading[],
  anchors: Set<string>,
  slugger: Slugger,
  level: number,
  text: string,
  line: number,
  style: Heading["style"]
): void {
  const slug = slugger.slug(text);
  headings.push({ level, text, slug, line, style });
  anchors.add(slug);
}

function collectLinks(
  line: string,
  lineNumber: number,
  definitions: ReadonlyMap<string, string>,
  links: MarkdownLink[],
  issues: StructuralIssue[]
): void {
  if (parseDefinition(line)) return;
  const found = extractLinks(line, lineNumber, definitions);
  links.push(...found.links);
  for (const label of found.undefinedLabels) {
    issues.push({
      kind: "undefined-reference",
      line: lineNumber,
      message: `Reference label [${label}] has no definition`,
    });
  }
}

function collectHtmlAnchors(line: string, anchors: Set<string>): void {
  const text = maskInlineCode(line);
  for (const match of text.matchAll(HTML_ANCHOR)) {
    if (match[1]) anchors.add(match[1]);
  }
  for (const match of text.matchAll(HTML_ID)) {
    if (match[1]) anchors.add(match[1]);
  }
}
