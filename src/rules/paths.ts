import { posix } from "node:path";

/**
 * Resolve a link path written in `fromPath` to a root-relative path.
 * A leading "/" means relative to the guide root.
 */
export function resolveLinkPath(fromPath: string, linkPath: string): string {
  const joined = linkPath.startsWith("/")
    ? linkPath.slice(1)
    : posix.join(posix.dirname(fromPath), linkPath);
  return posix.normalize(joined).replace(/^\.\//, "");
}

export function isMarkdownPath(path: string): boolean {
  return /\.(?:md|markdown)$/i.test(path);
}
