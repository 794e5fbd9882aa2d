export * from "./types";
export { loadGuideSet, createGuideSet, listGuideFiles, type LoadGuideSetOptions } from "./loader";
export { runChecks, checkGuides, summarize, hasFailures, type RunOptions, type FailurePolicy } from "./runner";
export { buildSuppressions, type Suppressions } from "./suppressions";
export { globToRegExp, matchesAny } from "./glob";
export { guideIndexStatus, type GuideStatus, type IndexStatus } from "./status";
