import type { GuideRule } from "./types";
import { indexEntriesRule, indexOrphansRule } from "./index-entries";
import { markdownStructureRule, headingHierarchyRule } from "./structure";
import { tocAnchorsRule, relativeLinksRule } from "./anchors";
import { placeholdersRule } from "./placeholders";
import { tableArithmeticRule } from "./table-arithmetic";

export type { GuideRule, RuleContext, RuleFinding } from "./types";
export { extractIndexEntries, type IndexEntry } from "./index-entries";
export { DEFAULT_PLACEHOLDER_PATTERNS, compilePlaceholderPatterns, findPlaceholders } from "./placeholders";
export { isTotalHeader, numericColumns } from "./table-arithmetic";
export { suggestClosest, levenshtein } from "./suggest";
export { resolveLinkPath } from "./paths";

export const builtinRules: readonly GuideRule[] = [
  indexEntriesRule,
  indexOrphansRule,
  markdownStructureRule,
  headingHierarchyRule,
  tocAnchorsRule,
  relativeLinksRule,
  placeholdersRule,
  tableArithmeticRule,
];

export function getRule(id: string): GuideRule | undefined {
  return builtinRules.find((rule) => rule.id === id);
}

export {
  indexEntriesRule,
  indexOrphansRule,
  markdownStructureRule,
  headingHierarchyRule,
  tocAnchorsRule,
  relativeLinksRule,
  placeholdersRule,
  tableArithmeticRule,
};
