/**
 * Citation tooling types.
 *
 * Standard form: Author, "Title" (Year)
 *   Bass, Clements, & Kazman, "Software Architecture in Practice" (2012)
 *   Vaswani et al., "Attention Is All You Need" (2017)
 */

export interface CitationEntry {
  coAuthors?: string[];
  /** Always render as "<Author> et al." */
  etAl?: boolean;
  title: string;
  year: string;
  venue?: string;
  publisher?: string;
  category?: string;
}

export interface CitationDatabase {
  /** Category display order for bibliographies */
  categories: string[];
  /** Entries keyed by primary author surname, in file order */
  entries: Map<string, CitationEntry>;
}

export type CitationStyle =
  | "bracket-comma"
  | "bracket-paren"
  | "paren-comma"
  | "paren-space"
  | "standard";

export interface Citation {
  /** Text as found in the document */
  raw: string;
  style: CitationStyle;
  /** Primary author surname */
  author: string;
  year: string;
  line: number;
  /** Standardized text, or null when the author is unknown */
  standard: string | null;
  /** Database key the citation resolved to */
  key: string | null;
}

export interface StandardizeResult {
  content: string;
  /** Citations rewritten to the standard form */
  updated: Citation[];
  /** Citations already written in the standard form */
  unchanged: Citation[];
  /** Citations with no database entry, left as written */
  review: Citation[];
}
