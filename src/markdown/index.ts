export * from "./types";
export { parseDocument } from "./parser";
export { slugify, Slugger } from "./slug";
export { extractInlineText, maskInlineCode, mapOutsideInlineCode, splitInlineCode } from "./inline";
export { splitTableRow, isDelimiterRow, parseNumber, normalizeHeader, type ParsedNumber } from "./tables";
export { extractLinks, splitTarget, isExternalTarget, normalizeLabel } from "./links";
export { buildToc, replaceTocBlock, tocHeadings, TOC_START, TOC_END, type TocOptions } from "./toc";
