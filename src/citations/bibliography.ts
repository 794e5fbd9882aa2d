/**
 * Generated citation documents: the bibliography and the standardization report.
 */

import { Slugger } from "../markdown/slug";
import { formatCitation } from "./format";
import type { Citation, CitationDatabase, CitationEntry, StandardizeResult } from "./types";

export interface FileCitations {
  file: string;
  result: StandardizeResult;
}

const REVIEW_HEADING = "Citations Needing Review";
const UNCATEGORIZED = "Uncategorized";

interface ReviewItem {
  file: string;
  citation: Citation;
}

function reviewItems(results: FileCitations[]): ReviewItem[] {
  const seen = new Set<string>();
  const items: ReviewItem[] = [];
  for (const { file, result } of results) {
    for (const citation of result.review) {
      if (seen.has(citation.raw)) continue;
      seen.add(citation.raw);
      items.push({ file, citation });
    }
  }
  return items;
}

function bibliographyLine(key: string, entry: CitationEntry, files: Iterable<string>): string {
  const source = entry.venue ?? entry.publisher;
  const citation = source ? `${formatCitation(key, entry)}. ${source}.` : `${formatCitation(key, entry)}.`;
  return `- ${citation} (used in: ${[...files].join(", ")})`;
}

/**
 * Bibliography of every resolved citation, grouped by category, each entry
 * naming the files that cite it.
 * Categories follow the database order; unlisted ones follow alphabetically.
 */
export function buildBibliography(results: FileCitations[], db: CitationDatabase): string {
  // Citing files per key, in scan order
  const cited = new Map<string, Set<string>>();
  for (const { file, result } of results) {
    for (const citation of [...result.updated, ...result.unchanged]) {
      if (citation.key === null || !db.entries.has(citation.key)) continue;
      const files = cited.get(citation.key) ?? new Set<string>();
      files.add(file);
      cited.set(citation.key, files);
    }
  }

  const groups = new Map<string, string[]>();
  for (const [key, files] of [...cited].sort(([a], [b]) => a.localeCompare(b))) {
    const entry = db.entries.get(key);
    if (!entry) continue;
    const category = entry.category ?? UNCATEGORIZED;
    groups.set(category, [...(groups.get(category) ?? []), bibliographyLine(key, entry, files)]);
  }

  const extra = [...groups.keys()]
    .filter((category) => !db.categories.includes(category))
    .sort((a, b) => a.localeCompare(b));
  const categories = [...db.categories.filter((category) => groups.has(category)), ...extra];

  // Same slug sequence the parser produces for this document
  const slugger = new Slugger();
  slugger.slug("Bibliography");
  slugger.slug("Contents");
  const sections = [...categories, REVIEW_HEADING].map((heading) => ({ heading, slug: slugger.slug(heading) }));

  const out: string[] = ["# Bibliography", "", "## Contents", ""];
  for (const { heading, slug } of sections) {
    out.push(`- [${heading}](#${slug})`);
  }

  for (const category of categories) {
    out.push("", `## ${category}`, "", ...(groups.get(category) ?? []));
  }

  out.push("", `## ${REVIEW_HEADING}`, "");
  const review = reviewItems(results);
  if (review.length === 0) {
    out.push("None.");
  } else {
    for (const { file, citation } of review) {
      out.push(`- \`${citation.raw}\` (${file}, line ${citation.line})`);
    }
  }

  return `${out.join("\n")}\n`;
}

export interface CitationReportOptions {
  /** Printed under the title when given */
  date?: string;
}

export function buildCitationReport(results: FileCitations[], options: CitationReportOptions = {}): string {
  const totals = results.reduce(
    (sum, { result }) => ({
      updated: sum.updated + result.updated.length,
      unchanged: sum.unchanged + result.unchanged.length,
      review: sum.review + result.review.length,
    }),
    { updated: 0, unchanged: 0, review: 0 }
  );

  const out: string[] = ["# Citation Standardization Report", ""];
  if (options.date) out.push(`Generated: ${options.date}`, "");

  out.push(
    "## Summary",
    "",
    `- Files scanned: ${results.length}`,
    `- Citations updated: ${totals.updated}`,
    `- Already standard: ${totals.unchanged}`,
    `- Needing review: ${totals.review}`,
    "",
    "## Files",
    "",
    "| File | Updated | Already standard | Review |",
    "| --- | --- | --- | --- |"
  );
  for (const { file, result } of results) {
    out.push(`| ${file} | ${result.updated.length} | ${result.unchanged.length} | ${result.review.length} |`);
  }

  out.push("", "## Needing Review", "");
  const review = reviewItems(results);
  if (review.length === 0) {
    out.push("None.");
  } else {
    for (const { file, citation } of review) {
      out.push(`- ${file}:${citation.line} \`${citation.raw}\``);
    }
  }

  return `${out.join("\n")}\n`;
}
