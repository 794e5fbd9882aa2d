/**
 * Heading anchor slugs, GitHub style.
 *
 * "## 1. Finding Bees" -> "1-finding-bees"
 * Repeated headings get -1, -2, ... suffixes in document order.
 */

import { extractInlineText } from "./inline";

// Anything that is not a letter, mark, number, connector (underscore),
// space or hyphen is dropped.
const STRIP_PATTERN = /[^\p{L}\p{M}\p{N}\p{Pc} -]/gu;

export function slugify(text: string): string {
  return extractInlineText(text)
    .toLowerCase()
    .replace(STRIP_PATTERN, "")
    .replace(/ /g, "-");
}

/**
 * Stateful slugger tracking occurrences for duplicate suffixes.
 */
export class Slugger {
  private readonly occurrences = new Map<string, number>();

  slug(text: string): string {
    const original = slugify(text);
    let result = original;

    while (this.occurrences.has(result)) {
      const count = (this.occurrences.get(original) ?? 0) + 1;
      this.occurrences.set(original, count);
      result = `${original}-${count}`;
    }

    this.occurrences.set(result, 0);
    return result;
  }

  reset(): void {
    this.occurrences.clear();
  }
}
