/**
 * Inline suppression comments:
 *
 *   <!-- guidecheck-disable-next-line placeholders -->
 *   <!-- guidecheck-disable table-arithmetic -->
 *   ...
 *   <!-- guidecheck-enable table-arithmetic -->
 *
 * Without rule ids the directive applies to every rule.
 */

import type { GuideDocument } from "../markdown/types";

const DIRECTIVE = /<!--\s*guidecheck-(disable-next-line|disable|enable)\b([^>]*?)-->/g;
const ALL_RULES = "*";

interface SuppressedRange {
  rule: string;
  start: number;
  end: number;
}

export interface Suppressions {
  isSuppressed(ruleId: string, line: number): boolean;
}

export function buildSuppressions(doc: GuideDocument): Suppressions {
  const ranges: SuppressedRange[] = [];
  const open = new Map<string, number>();

  doc.lines.forEach((line, i) => {
    const lineNumber = i + 1;
    if (doc.codeLines.has(lineNumber)) return;

    for (const match of line.matchAll(DIRECTIVE)) {
      const ids = (match[2] ?? "").split(/[\s,]+/).filter(Boolean);
      const rules = ids.length > 0 ? ids : [ALL_RULES];

      switch (match[1]) {
        case "disable-next-line":
          for (const rule of rules) ranges.push({ rule, start: lineNumber + 1, end: lineNumber + 1 });
          break;
        case "disable":
          for (const rule of rules) {
            if (!open.has(rule)) open.set(rule, lineNumber);
          }
          break;
        case "enable": {
          const closing = ids.length > 0 ? ids : [...open.keys()];
          for (const rule of closing) {
            const start = open.get(rule);
            if (start === undefined) continue;
            ranges.push({ rule, start, end: lineNumber });
            open.delete(rule);
          }
          break;
        }
      }
    }
  });

  for (const [rule, start] of open) {
    ranges.push({ rule, start, end: Number.POSITIVE_INFINITY });
  }

  return {
    isSuppressed(ruleId, line) {
      return ranges.some(
        (range) => (range.rule === ALL_RULES || range.rule === ruleId) && line >= range.start && line <= range.end
      );
    },
  };
}
