import type { GuideCheckConfig, Severity } from "../config/schema";
import type { Finding, GuideSet } from "../checker/types";

export interface RuleContext {
  set: GuideSet;
  config: GuideCheckConfig;
}

/** A finding before the configured severity is applied */
export type RuleFinding = Omit<Finding, "severity" | "ruleId">;

export interface GuideRule {
  id: string;
  description: string;
  defaultSeverity: Severity;
  check(context: RuleContext): RuleFinding[];
}
