export * from "./types";
export {
  CitationEntrySchema,
  CitationDatabaseFileSchema,
  DEFAULT_DATABASE_PATH,
  createCitationDatabase,
  loadCitationDatabase,
  lookupCitation,
} from "./database";
export { primaryAuthor, formatAuthors, formatCitation } from "./format";
export { extractCitations, leadingName, standardizeCitations } from "./extract";
export { buildBibliography, buildCitationReport, type FileCitations, type CitationReportOptions } from "./bibliography";
