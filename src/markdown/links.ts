/**
 * Link extraction: inline, reference and autolinks.
 */

import type { MarkdownLink } from "./types";
import { maskInlineCode } from "./inline";

const INLINE_LINK =
  /(!?)\[((?:[^[\]\\]|\\.|\[[^\]]*\])*)\]\(\s*(<[^>]*>|[^\s()]*(?:\([^\s()]*\)[^\s()]*)*)(?:\s+(?:"[^"]*"|'[^']*'|\([^)]*\)))?\s*\)/g;
const REFERENCE_LINK = /(!?)\[((?:[^[\]\\]|\\.|\[[^\]]*\])*)\]\[([^\]]*)\]/g;
const AUTOLINK = /<((?:https?|ftp|mailto):[^\s<>]+)>/g;
const DEFINITION = /^ {0,3}\[([^\]]+)\]:\s*(<[^>]*>|\S+)(?:\s+.*)?$/;

export function normalizeLabel(label: string): string {
  return label.trim().replace(/\s+/g, " ").toLowerCase();
}

/**
 * Parse a link reference definition line (`[label]: target`).
 */
export function parseDefinition(line: string): { label: string; target: string } | null {
  const match = DEFINITION.exec(line);
  if (!match?.[1] || !match[2]) return null;
  return { label: normalizeLabel(match[1]), target: unwrapTarget(match[2]) };
}

function unwrapTarget(target: string): string {
  return target.startsWith("<") && target.endsWith(">") ? target.slice(1, -1) : target;
}

export function isExternalTarget(target: string): boolean {
  return /^[a-z][a-z0-9+.-]*:/i.test(target) || target.startsWith("//");
}

/**
 * Split a target into its path and decoded fragment.
 * Query strings are dropped from the path.
 */
export function splitTarget(target: string): { path: string; fragment: string | null } {
  const hashIndex = target.indexOf("#");
  const rawPath = hashIndex === -1 ? target : target.slice(0, hashIndex);
  const rawFragment = hashIndex === -1 ? null : target.slice(hashIndex + 1);

  const queryIndex = rawPath.indexOf("?");
  const path = queryIndex === -1 ? rawPath : rawPath.slice(0, queryIndex);

  return {
    path: safeDecode(path),
    fragment: rawFragment === null ? null : safeDecode(rawFragment),
  };
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

export interface LineLinks {
  links: MarkdownLink[];
  /** Reference labels used on this line with no definition */
  undefinedLabels: string[];
}

/**
 * Extract every link on a single line.
 */
export function extractLinks(
  line: string,
  lineNumber: number,
  definitions: ReadonlyMap<string, string>
): LineLinks {
  const text = maskInlineCode(line);
  const links: MarkdownLink[] = [];
  const undefinedLabels: string[] = [];

  for (const match of text.matchAll(INLINE_LINK)) {
    links.push(buildLink(match[2] ?? "", unwrapTarget(match[3] ?? ""), "inline", match[1] === "!", lineNumber));
  }

  for (const match of text.matchAll(REFERENCE_LINK)) {
    const linkText = match[2] ?? "";
    const label = normalizeLabel(match[3] || linkText);
    const target = definitions.get(label);
    if (target === undefined) {
      undefinedLabels.push(match[3] || linkText);
      continue;
    }
    links.push(buildLink(linkText, target, "reference", match[1] === "!", lineNumber));
  }

  for (const match of text.matchAll(AUTOLINK)) {
    const target = match[1] ?? "";
    links.push(buildLink(target, target, "autolink", false, lineNumber));
  }

  return { links, undefinedLabels };
}

function buildLink(
  text: string,
  target: string,
  kind: MarkdownLink["kind"],
  image: boolean,
  line: number
): MarkdownLink {
  const external = isExternalTarget(target);
  const { path, fragment } = external ? { path: target, fragment: null } : splitTarget(target);
  return { text, target, path, fragment, external, image, kind, line };
}
