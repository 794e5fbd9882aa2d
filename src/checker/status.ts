import { extractIndexEntries } from "../rules/index-entries";
import type { GuideSet } from "./types";

export type IndexStatus = "listed" | "missing" | "orphan";

export interface GuideStatus {
  /** Root-relative path */
  path: string;
  /** H1 title, or null for missing files and untitled guides */
  title: string | null;
  status: IndexStatus;
  /** Index line listing the guide, 0 for orphans */
  line: number;
}

/**
 * Cross-reference the guides on disk with the index.
 * Listed and missing entries come first in index order, orphans after by path.
 */
export function guideIndexStatus(set: GuideSet): GuideStatus[] {
  const statuses: GuideStatus[] = [];
  const listed = new Set<string>();

  if (set.index) {
    for (const entry of extractIndexEntries(set.index)) {
      listed.add(entry.path);
      const doc = set.documents.get(entry.path);
      statuses.push({
        path: entry.path,
        title: doc?.title ?? null,
        status: set.fileExists(entry.path) ? "listed" : "missing",
        line: entry.line,
      });
    }
  }

  for (const [path, doc] of set.documents) {
    if (path === set.indexPath || listed.has(path)) continue;
    statuses.push({ path, title: doc.title, status: "orphan", line: 0 });
  }

  return statuses;
}
