import type { CitationEntry } from "./types";

/**
 * Primary author surname from the author part of a citation.
 *
 *   "Vaswani et al."     -> "Vaswani"
 *   "Millington & Funge" -> "Millington"
 *   "Sutton and Barto"   -> "Sutton"
 *   "Van Vliet"          -> "Vliet"
 */
export function primaryAuthor(authorPart: string): string {
  const trimmed = authorPart.trim();

  if (/\bet\s+al\b/i.test(trimmed)) {
    return (trimmed.split(/\s+/)[0] ?? "").replace(/[.,]+$/, "");
  }

  const conjunction = /\s*(?:&|\band\b)\s*/i.exec(trimmed);
  if (conjunction || trimmed.includes(",")) {
    // "Bass, Clements, and Kazman" or "Van Vliet & Smith": the whole first name
    const first = conjunction ? trimmed.slice(0, conjunction.index) : trimmed;
    return (first.split(",")[0] ?? "").trim().replace(/[.,]+$/, "");
  }

  const words = trimmed.split(/\s+/);
  return (words[words.length - 1] ?? "").replace(/[.,]+$/, "");
}

export function formatAuthors(author: string, entry: CitationEntry): string {
  if (entry.etAl) return `${author} et al.`;

  const coAuthors = entry.coAuthors ?? [];
  if (coAuthors.length === 1) return `${author} & ${coAuthors[0]}`;
  if (coAuthors.length === 2) return `${author}, ${coAuthors[0]}, & ${coAuthors[1]}`;
  if (coAuthors.length > 2) return `${author} et al.`;
  return author;
}

/**
 * Standard form: Author, "Title" (Year)
 */
export function formatCitation(author: string, entry: CitationEntry): string {
  const authors = formatAuthors(author, entry);
  return entry.title ? `${authors}, "${entry.title}" (${entry.year})` : `${authors} (${entry.year})`;
}
