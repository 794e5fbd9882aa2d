import { maskInlineCode } from "../markdown/inline";
import type { PlaceholderConfig } from "../config/schema";
import type { GuideRule, RuleFinding } from "./types";

export const DEFAULT_PLACEHOLDER_PATTERNS: readonly string[] = [
  // Template variables: {{name}}, ${name}
  String.raw`\{\{[^}]*\}\}`,
  String.raw`\$\{[^}]*\}`,
  // Bracketed markers: [TODO], [TBD: pricing], [PLACEHOLDER]
  String.raw`\[(?:TODO|TBD|FIXME|PLACEHOLDER|INSERT)\b[^\]]*\]`,
  // Angle-bracket prompts: <INSERT NAME>, <ADD LINK HERE>
  String.raw`<(?:INSERT|ADD|FILL IN|REPLACE)\b[^>]*>`,
  String.raw`\bTBD\b`,
  String.raw`\bXXX\b`,
  String.raw`[Ll]orem [Ii]psum`,
];

const DIRECTIVE_COMMENT = /<!--\s*guidecheck-[\s\S]*?-->/g;

export function compilePlaceholderPatterns(config: PlaceholderConfig): RegExp[] {
  const sources = [...(config.useDefaults ? DEFAULT_PLACEHOLDER_PATTERNS : []), ...config.patterns];
  return sources.map((source) => new RegExp(source, "g"));
}

/**
 * Placeholders on one line, left to right. Overlapping matches collapse into
 * the one that starts first (the longest when two start together).
 */
export function findPlaceholders(text: string, patterns: readonly RegExp[]): string[] {
  const matches: Array<{ start: number; end: number; text: string }> = [];
  for (const pattern of patterns) {
    for (const match of text.matchAll(pattern)) {
      if (!match[0]) continue;
      const start = match.index ?? 0;
      matches.push({ start, end: start + match[0].length, text: match[0] });
    }
  }

  matches.sort((a, b) => a.start - b.start || b.end - a.end);

  const result: string[] = [];
  let coveredUntil = -1;
  for (const match of matches) {
    if (match.start < coveredUntil) continue;
    result.push(match.text);
    coveredUntil = match.end;
  }
  return result;
}

export const placeholdersRule: GuideRule = {
  id: "placeholders",
  description: "No unresolved template placeholders outside code",
  defaultSeverity: "error",
  check({ set, config }) {
    const patterns = compilePlaceholderPatterns(config.placeholders);
    const findings: RuleFinding[] = [];

    for (const doc of set.documents.values()) {
      doc.lines.forEach((line, i) => {
        const lineNumber = i + 1;
        if (doc.codeLines.has(lineNumber)) return;

        const text = maskInlineCode(line).replace(DIRECTIVE_COMMENT, (comment) => " ".repeat(comment.length));
        for (const placeholder of findPlaceholders(text, patterns)) {
          findings.push({
            file: doc.path,
            line: lineNumber,
            message: `Unresolved placeholder "${placeholder}"`,
          });
        }
      });
    }

    return findings;
  },
};
