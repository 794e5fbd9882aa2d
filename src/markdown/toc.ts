/**
 * Table of contents generation from a document's headings.
 */

import type { GuideDocument, Heading } from "./types";
import { extractInlineText } from "./inline";

export const TOC_START = "<!-- toc -->";
export const TOC_END = "<!-- tocstop -->";

export interface TocOptions {
  minLevel: number;
  maxLevel: number;
}

const DEFAULT_TOC: TocOptions = { minLevel: 2, maxLevel: 3 };

const CONTENTS_HEADING = /^(?:table of )?contents$/i;

export function tocHeadings(doc: GuideDocument, options: TocOptions = DEFAULT_TOC): Heading[] {
  return doc.headings.filter(
    (heading) =>
      heading.level >= options.minLevel &&
      heading.level <= options.maxLevel &&
      !CONTENTS_HEADING.test(extractInlineText(heading.text))
  );
}

/**
 * Build a nested bullet list linking every heading in range.
 */
export function buildToc(doc: GuideDocument, options: TocOptions = DEFAULT_TOC): string {
  return tocHeadings(doc, options)
    .map((heading) => {
      const indent = "  ".repeat(heading.level - options.minLevel);
      const label = extractInlineText(heading.text).replace(/([[\]])/g, "\\$1");
      return `${indent}- [${label}](#${heading.slug})`;
    })
    .join("\n");
}

/**
 * Replace the content between the toc markers.
 * Returns null when the markers are missing or out of order.
 */
export function replaceTocBlock(source: string, toc: string): string | null {
  const start = source.indexOf(TOC_START);
  if (start === -1) return null;
  const end = source.indexOf(TOC_END, start + TOC_START.length);
  if (end === -1) return null;

  const before = source.slice(0, start + TOC_START.length);
  const after = source.slice(end);
  return `${before}\n\n${toc}\n\n${after}`;
}
