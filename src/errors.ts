/**
 * Error types raised by the guidecheck library.
 *
 * Content problems in guides are never thrown; they become findings.
 * These errors cover the cases where a check cannot run at all.
 */

/**
 * Configuration file could not be read or failed schema validation.
 */
export class ConfigError extends Error {
  readonly path: string | null;
  readonly issues: string[];

  constructor(params: { message: string; path?: string | null; issues?: string[] }) {
    super(params.message);
    this.name = "ConfigError";
    this.path = params.path ?? null;
    this.issues = params.issues ?? [];
  }
}

/**
 * Guide directory is missing or is not a directory.
 */
export class GuideDirectoryError extends Error {
  readonly dir: string;

  constructor(params: { message: string; dir: string }) {
    super(params.message);
    this.name = "GuideDirectoryError";
    this.dir = params.dir;
  }
}

/**
 * Table formula could not be parsed or evaluated.
 */
export class FormulaError extends Error {
  readonly formula: string;
  /** Zero-based character offset, or -1 for evaluation errors */
  readonly position: number;

  constructor(params: { message: string; formula: string; position?: number }) {
    super(params.message);
    this.name = "FormulaError";
    this.formula = params.formula;
    this.position = params.position ?? -1;
  }
}

/**
 * Citation database file is unreadable or malformed.
 */
export class CitationDatabaseError extends Error {
  readonly path: string;
  readonly issues: string[];

  constructor(params: { message: string; path: string; issues?: string[] }) {
    super(params.message);
    this.name = "CitationDatabaseError";
    this.path = params.path;
    this.issues = params.issues ?? [];
  }
}

export type GuideCheckError =
  | ConfigError
  | GuideDirectoryError
  | FormulaError
  | CitationDatabaseError;

export function isGuideCheckError(error: unknown): error is GuideCheckError {
  return (
    error instanceof ConfigError ||
    error instanceof GuideDirectoryError ||
    error instanceof FormulaError ||
    error instanceof CitationDatabaseError
  );
}
