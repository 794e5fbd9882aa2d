import type { GuideRule, RuleFinding } from "./types";

export const markdownStructureRule: GuideRule = {
  id: "markdown-structure",
  description: "Fences are closed, table rows match the header, headings are well-formed, reference labels are defined",
  defaultSeverity: "error",
  check({ set }) {
    const findings: RuleFinding[] = [];
    for (const doc of set.documents.values()) {
      for (const issue of doc.issues) {
        findings.push({ file: doc.path, line: issue.line, message: issue.message });
      }
    }
    return findings;
  },
};

export const headingHierarchyRule: GuideRule = {
  id: "heading-hierarchy",
  description: "Heading levels increase one step at a time and there is at most one H1",
  defaultSeverity: "warning",
  check({ set }) {
    const findings: RuleFinding[] = [];

    for (const doc of set.documents.values()) {
      let previousLevel: number | null = null;
      let firstH1: number | null = null;

      for (const heading of doc.headings) {
        if (previousLevel !== null && heading.level > previousLevel + 1) {
          findings.push({
            file: doc.path,
            line: heading.line,
            message: `Heading level jumps from h${previousLevel} to h${heading.level}`,
          });
        }

        if (heading.level === 1) {
          if (firstH1 === null) {
            firstH1 = heading.line;
          } else {
            findings.push({
              file: doc.path,
              line: heading.line,
              message: `Multiple top-level headings (first on line ${firstH1})`,
            });
          }
        }

        previousLevel = heading.level;
      }
    }

    return findings;
  },
};
