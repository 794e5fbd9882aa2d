/**
 * Guide set and check result types.
 */

import type { GuideDocument } from "../markdown/types";
import type { Severity } from "../config/schema";

export interface GuideSet {
  /** Absolute guide directory */
  root: string;
  /** Parsed guides keyed by root-relative path (index included) */
  documents: Map<string, GuideDocument>;
  /** Root-relative path of the index document */
  indexPath: string;
  /** Parsed index, or null when the index file is absent */
  index: GuideDocument | null;
  /** Existence test for root-relative paths (any file type) */
  fileExists: (relativePath: string) => boolean;
}

export interface Finding {
  ruleId: string;
  severity: Severity;
  /** Root-relative path */
  file: string;
  /** 1-based line, 0 when the finding concerns the whole file */
  line: number;
  message: string;
}

export interface CheckSummary {
  files: number;
  errors: number;
  warnings: number;
  infos: number;
}

export interface CheckResult {
  root: string;
  findings: Finding[];
  summary: CheckSummary;
}
