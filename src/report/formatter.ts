/**
 * Check result output: grouped text for terminals and stable JSON for tools.
 */

import { createFormatters } from "../cli/utils/colors";
import type { CheckResult, CheckSummary, Finding } from "../checker/types";

export interface TextReportOptions {
  useColor?: boolean;
  /** Maps a root-relative file to the path shown in the header */
  displayPath?: (file: string) => string;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

export function summaryLine(summary: CheckSummary): string {
  const problems = summary.errors + summary.warnings + summary.infos;
  if (problems === 0) return `No problems found in ${plural(summary.files, "file")}`;

  const parts = [plural(summary.errors, "error"), plural(summary.warnings, "warning")];
  if (summary.infos > 0) parts.push(plural(summary.infos, "info"));
  return `${plural(problems, "problem")} (${parts.join(", ")}) in ${plural(summary.files, "file")}`;
}

function groupByFile(findings: readonly Finding[]): Map<string, Finding[]> {
  const groups = new Map<string, Finding[]>();
  for (const finding of findings) {
    groups.set(finding.file, [...(groups.get(finding.file) ?? []), finding]);
  }
  return groups;
}

export function formatText(result: CheckResult, options: TextReportOptions = {}): string {
  const { ok, fail, warn, subheader, dimText, setting } = createFormatters(options.useColor);
  const displayPath = options.displayPath ?? ((file: string) => file);
  const out: string[] = [];

  for (const [file, findings] of groupByFile(result.findings)) {
    const lineWidth = Math.max(...findings.map((finding) => (finding.line > 0 ? String(finding.line).length : 1)));

    out.push(subheader(displayPath(file)));
    for (const finding of findings) {
      const line = (finding.line > 0 ? String(finding.line) : "-").padStart(lineWidth);
      out.push(`  ${line}  ${setting(finding.severity)}  ${finding.message}  ${dimText(finding.ruleId)}`);
    }
    out.push("");
  }

  const { summary } = result;
  const line = summaryLine(summary);
  out.push(summary.errors > 0 ? fail(line) : summary.warnings + summary.infos > 0 ? warn(line) : ok(line));

  return out.join("\n");
}

export interface JsonReport {
  summary: CheckSummary;
  findings: Array<Pick<Finding, "file" | "line" | "severity" | "ruleId" | "message">>;
}

export function formatJson(result: CheckResult): string {
  const report: JsonReport = {
    summary: { ...result.summary },
    findings: result.findings.map(({ file, line, severity, ruleId, message }) => ({
      file,
      line,
      severity,
      ruleId,
      message,
    })),
  };
  return JSON.stringify(report, null, 2);
}
