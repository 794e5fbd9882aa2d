/**
 * Link rules: same-document anchors (tables of contents) and links between files.
 */

import type { GuideRule, RuleFinding } from "./types";
import { suggestClosest } from "./suggest";
import { isMarkdownPath, resolveLinkPath } from "./paths";

function describeMissingAnchor(fragment: string, anchors: Set<string>, where: string): string {
  const suggestion = suggestClosest(fragment, anchors);
  const hint = suggestion ? ` (did you mean "#${suggestion}"?)` : "";
  return `Anchor "#${fragment}" does not match any heading ${where}${hint}`;
}

export const tocAnchorsRule: GuideRule = {
  id: "toc-anchors",
  description: "Every in-document #fragment link matches a heading slug or HTML anchor",
  defaultSeverity: "error",
  check({ set }) {
    const findings: RuleFinding[] = [];

    for (const doc of set.documents.values()) {
      for (const link of doc.links) {
        if (link.external || link.path !== "" || !link.fragment) continue;
        if (doc.anchors.has(link.fragment)) continue;
        findings.push({
          file: doc.path,
          line: link.line,
          message: describeMissingAnchor(link.fragment, doc.anchors, "in this file"),
        });
      }
    }

    return findings;
  },
};

export const relativeLinksRule: GuideRule = {
  id: "relative-links",
  description: "Relative links point at existing files, and their anchors exist in the target",
  defaultSeverity: "error",
  check({ set }) {
    const findings: RuleFinding[] = [];

    for (const doc of set.documents.values()) {
      const isIndex = doc.path === set.indexPath;

      for (const link of doc.links) {
        if (link.external || link.path === "") continue;

        // Missing index entries are reported by index-entries
        if (isIndex && isMarkdownPath(link.path) && !link.fragment) continue;

        const target = resolveLinkPath(doc.path, link.path);
        if (!set.fileExists(target)) {
          if (isIndex && isMarkdownPath(link.path)) continue;
          findings.push({
            file: doc.path,
            line: link.line,
            message: `${link.image ? "Image" : "Link"} target ${link.path} does not exist`,
          });
          continue;
        }

        if (!link.fragment) continue;
        const targetDoc = set.documents.get(target);
        if (!targetDoc || targetDoc.anchors.has(link.fragment)) continue;
        findings.push({
          file: doc.path,
          line: link.line,
          message: describeMissingAnchor(link.fragment, targetDoc.anchors, `in ${link.path}`),
        });
      }
    }

    return findings;
  },
};
