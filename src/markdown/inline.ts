/**
 * Inline Markdown helpers: code spans and plain-text extraction.
 */

export interface InlineSegment {
  text: string;
  code: boolean;
}

/**
 * Split a line into code-span and text segments.
 * A code span opens on a backtick run and closes on a run of the same length;
 * an unmatched run is literal text.
 */
export function splitInlineCode(line: string): InlineSegment[] {
  const segments: InlineSegment[] = [];
  let textStart = 0;
  let i = 0;

  while (i < line.length) {
    if (line[i] !== "`") {
      i++;
      continue;
    }

    let runEnd = i;
    while (line[runEnd] === "`") runEnd++;
    const run = line.slice(i, runEnd);

    const close = findClosingRun(line, runEnd, run.length);
    if (close === -1) {
      i = runEnd;
      continue;
    }

    if (i > textStart) {
      segments.push({ text: line.slice(textStart, i), code: false });
    }
    segments.push({ text: line.slice(i, close + run.length), code: true });
    i = close + run.length;
    textStart = i;
  }

  if (textStart < line.length) {
    segments.push({ text: line.slice(textStart), code: false });
  }

  return segments;
}

function findClosingRun(line: string, from: number, length: number): number {
  let i = from;
  while (i < line.length) {
    if (line[i] !== "`") {
      i++;
      continue;
    }
    let end = i;
    while (line[end] === "`") end++;
    if (end - i === length) return i;
    i = end;
  }
  return -1;
}

/**
 * Apply `fn` to the text outside code spans, leaving code spans untouched.
 */
export function mapOutsideInlineCode(line: string, fn: (text: string) => string): string {
  return splitInlineCode(line)
    .map((segment) => (segment.code ? segment.text : fn(segment.text)))
    .join("");
}

/**
 * Replace code spans with spaces so offsets in the rest of the line stay valid.
 */
export function maskInlineCode(line: string): string {
  return splitInlineCode(line)
    .map((segment) => (segment.code ? " ".repeat(segment.text.length) : segment.text))
    .join("");
}

/**
 * Reduce inline Markdown to the text a renderer would show.
 * Used for heading slugs, titles and table header matching.
 */
export function extractInlineText(markdown: string): string {
  return splitInlineCode(markdown)
    .map((segment) => {
      if (segment.code) {
        return segment.text.replace(/^`+ ?/, "").replace(/ ?`+$/, "");
      }
      return segment.text
        // Images and links keep their visible text
        .replace(/!\[([^\]]*)\]\([^)]*\)/g, "$1")
        .replace(/\[([^\]]*)\]\([^)]*\)/g, "$1")
        .replace(/\[([^\]]*)\]\[[^\]]*\]/g, "$1")
        // HTML tags
        .replace(/<\/?[A-Za-z][^>]*>/g, "")
        // Emphasis and strikethrough
        .replace(/(\*\*|__)(?=\S)([\s\S]*?\S)\1/g, "$2")
        .replace(/\*(?=\S)([^*]*?\S)\*/g, "$1")
        .replace(/(^|[^\w])_(?=\S)([^_]*?\S)_(?!\w)/g, "$1$2")
        .replace(/~~(?=\S)([\s\S]*?\S)~~/g, "$1")
        // Backslash escapes
        .replace(/\\([!-\/:-@\[-`{-~])/g, "$1");
    })
    .join("")
    .trim();
}
