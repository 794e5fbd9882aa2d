import type { GuideCheckConfig, Severity } from "../config/schema";
import { builtinRules } from "../rules";
import type { GuideRule, RuleFinding } from "../rules/types";
import { buildSuppressions, type Suppressions } from "./suppressions";
import { loadGuideSet, type LoadGuideSetOptions } from "./loader";
import type { CheckResult, CheckSummary, Finding, GuideSet } from "./types";

export interface RunOptions {
  rules?: readonly GuideRule[];
  /** Run only these rule ids */
  only?: readonly string[];
}

const SEVERITY_ORDER: Record<Severity, number> = { error: 0, warning: 1, info: 2 };

export function runChecks(set: GuideSet, config: GuideCheckConfig, options: RunOptions = {}): CheckResult {
  const rules = options.rules ?? builtinRules;
  const suppressions = new Map<string, Suppressions>();
  const findings: Finding[] = [];

  const isSuppressed = (finding: Finding): boolean => {
    const doc = set.documents.get(finding.file) ?? (finding.file === set.indexPath ? set.index : null);
    if (!doc || finding.line === 0) return false;
    let fileSuppressions = suppressions.get(doc.path);
    if (!fileSuppressions) {
      fileSuppressions = buildSuppressions(doc);
      suppressions.set(doc.path, fileSuppressions);
    }
    return fileSuppressions.isSuppressed(finding.ruleId, finding.line);
  };

  for (const rule of rules) {
    if (options.only && !options.only.includes(rule.id)) continue;
    const setting = config.rules[rule.id] ?? rule.defaultSeverity;
    if (setting === "off") continue;

    let raw: RuleFinding[];
    try {
      raw = rule.check({ set, config });
    } catch (error) {
      findings.push({
        ruleId: "internal",
        severity: "error",
        file: set.indexPath,
        line: 0,
        message: `Rule ${rule.id} failed: ${error instanceof Error ? error.message : String(error)}`,
      });
      continue;
    }

    for (const item of raw) {
      const finding: Finding = { ...item, ruleId: rule.id, severity: setting };
      if (!isSuppressed(finding)) findings.push(finding);
    }
  }

  findings.sort(
    (a, b) =>
      a.file.localeCompare(b.file) ||
      a.line - b.line ||
      SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity] ||
      a.ruleId.localeCompare(b.ruleId)
  );

  return { root: set.root, findings, summary: summarize(findings, set.documents.size) };
}

export function summarize(findings: readonly Finding[], files: number): CheckSummary {
  const summary: CheckSummary = { files, errors: 0, warnings: 0, infos: 0 };
  for (const finding of findings) {
    if (finding.severity === "error") summary.errors++;
    else if (finding.severity === "warning") summary.warnings++;
    else summary.infos++;
  }
  return summary;
}

/**
 * Load and check a guide directory in one step.
 */
export function checkGuides(
  root: string,
  config: GuideCheckConfig,
  options: RunOptions & LoadGuideSetOptions = {}
): CheckResult {
  return runChecks(loadGuideSet(root, config, options), config, options);
}

export interface FailurePolicy {
  /** Treat any warning as a failure */
  strict?: boolean;
  /** Fail when warnings exceed this count */
  maxWarnings?: number;
}

export function hasFailures(result: CheckResult, policy: FailurePolicy = {}): boolean {
  const { errors, warnings } = result.summary;
  if (errors > 0) return true;
  if (policy.strict && warnings > 0) return true;
  return policy.maxWarnings !== undefined && warnings > policy.maxWarnings;
}
