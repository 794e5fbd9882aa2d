/**
 * Markdown Document Model
 *
 * Line-oriented view of a guide file. Line numbers are 1-based throughout.
 */

export type HeadingStyle = "atx" | "setext";

export interface Heading {
  /** 1..6 */
  level: number;
  /** Raw heading text with closing `#` sequence removed */
  text: string;
  /** Anchor slug, including the duplicate suffix when repeated */
  slug: string;
  line: number;
  style: HeadingStyle;
}

export interface CodeBlock {
  fence: string;
  /** Info string after the opening fence (language etc.) */
  info: string;
  startLine: number;
  /** null when the fence is never closed */
  endLine: number | null;
}

export type ColumnAlign = "left" | "right" | "center" | null;

export interface TableRow {
  line: number;
  cells: string[];
}

export interface MarkdownTable {
  /** Line of the header row */
  line: number;
  header: string[];
  align: ColumnAlign[];
  rows: TableRow[];
}

export type LinkKind = "inline" | "reference" | "autolink";

export interface MarkdownLink {
  text: string;
  /** Target exactly as written (after reference resolution) */
  target: string;
  /** Path part of the target, empty for same-document fragments */
  path: string;
  /** Decoded fragment without `#`, or null when absent */
  fragment: string | null;
  /** Scheme-qualified or protocol-relative target */
  external: boolean;
  image: boolean;
  kind: LinkKind;
  line: number;
}

export type StructuralIssueKind =
  | "unclosed-fence"
  | "table-column-mismatch"
  | "table-delimiter-mismatch"
  | "heading-missing-space"
  | "empty-heading"
  | "undefined-reference";

export interface StructuralIssue {
  kind: StructuralIssueKind;
  line: number;
  message: string;
}

export interface GuideDocument {
  /** Path relative to the guide root, `/`-separated */
  path: string;
  /** File name without directories */
  name: string;
  lines: string[];
  /** Text of the first H1, or null */
  title: string | null;
  headings: Heading[];
  tables: MarkdownTable[];
  links: MarkdownLink[];
  codeBlocks: CodeBlock[];
  /** Heading slugs plus explicit HTML `name`/`id` anchors */
  anchors: Set<string>;
  /** Lines that belong to fenced code or front matter */
  codeLines: Set<number>;
  issues: StructuralIssue[];
}
