/**
 * Guide set loading
 *
 * Lists the Markdown files under the guide root, parses each one and
 * locates the index document. Paths inside a GuideSet are root-relative
 * and `/`-separated on every platform.
 */

import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { join } from "node:path";
import type { GuideCheckConfig } from "../config/schema";
import type { GuideDocument } from "../markdown/types";
import { parseDocument } from "../markdown/parser";
import { GuideDirectoryError } from "../errors";
import { matchesAny } from "./glob";
import type { GuideSet } from "./types";

const MARKDOWN_FILE = /\.(?:md|markdown)$/i;
const SKIPPED_DIRS = new Set(["node_modules"]);

export interface LoadGuideSetOptions {
  /** Called after each guide is parsed, in path order */
  onDocument?: (doc: GuideDocument) => void;
}

export function listGuideFiles(root: string, options: { recursive: boolean; ignore: readonly string[] }): string[] {
  const files: string[] = [];

  const walk = (relativeDir: string): void => {
    const entries = readdirSync(relativeDir ? join(root, relativeDir) : root, { withFileTypes: true });
    for (const entry of entries) {
      const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        if (options.recursive && !entry.name.startsWith(".") && !SKIPPED_DIRS.has(entry.name)) {
          walk(relativePath);
        }
        continue;
      }
      if (entry.isFile() && MARKDOWN_FILE.test(entry.name) && !matchesAny(relativePath, options.ignore)) {
        files.push(relativePath);
      }
    }
  };

  walk("");
  return files.sort();
}

export function loadGuideSet(root: string, config: GuideCheckConfig, options: LoadGuideSetOptions = {}): GuideSet {
  if (!existsSync(root)) {
    throw new GuideDirectoryError({ message: `Guide directory not found: ${root}`, dir: root });
  }
  if (!statSync(root).isDirectory()) {
    throw new GuideDirectoryError({ message: `Not a directory: ${root}`, dir: root });
  }

  const documents: GuideDocument[] = [];
  for (const relativePath of listGuideFiles(root, config)) {
    const doc = parseDocument(relativePath, readFileSync(join(root, relativePath), "utf-8"));
    documents.push(doc);
    options.onDocument?.(doc);
  }

  const indexPath = toPosix(config.indexFile);
  const cache = new Map<string, boolean>();
  const fileExists = (relativePath: string): boolean => {
    let exists = cache.get(relativePath);
    if (exists === undefined) {
      exists = existsSync(join(root, ...relativePath.split("/")));
      cache.set(relativePath, exists);
    }
    return exists;
  };

  const set = createGuideSet(root, documents, { indexPath, fileExists });

  // An ignored index is still the index
  if (!set.index && fileExists(indexPath)) {
    set.index = parseDocument(indexPath, readFileSync(join(root, ...indexPath.split("/")), "utf-8"));
  }

  return set;
}

/**
 * Assemble a guide set from already-parsed documents.
 * Without `fileExists`, only the given documents exist.
 */
export function createGuideSet(
  root: string,
  documents: readonly GuideDocument[],
  options: { indexPath?: string; fileExists?: (relativePath: string) => boolean } = {}
): GuideSet {
  const byPath = new Map(documents.map((doc) => [doc.path, doc] as const));
  const indexPath = options.indexPath ?? "GUIDE_INDEX.md";

  return {
    root,
    documents: byPath,
    indexPath,
    index: byPath.get(indexPath) ?? null,
    fileExists: options.fileExists ?? ((relativePath) => byPath.has(relativePath)),
  };
}

function toPosix(path: string): string {
  return path.replace(/\\/g, "/").replace(/^\.\//, "");
}
