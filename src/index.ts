/**
 * guidecheck
 *
 * Quality checks for a directory of Markdown guides: index coverage,
 * Markdown structure, heading anchors, placeholders and table arithmetic.
 * Also ships the citation standardization tooling used alongside the guides.
 */

export * from "./errors";
export * from "./markdown";
export * from "./formula";
export * from "./config";
export * from "./checker";
export * from "./rules";
export * from "./citations";
export * from "./report";
