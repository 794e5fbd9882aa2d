import { z } from "zod";
import { parseFormula } from "../formula";
import { FormulaError } from "../errors";

function isValidPattern(source: string): boolean {
  try {
    new RegExp(source, "g");
    return true;
  } catch {
    return false;
  }
}

// Rule severity
export const SeveritySchema = z.enum(["error", "warning", "info"]);

export const RuleSettingSchema = z.union([SeveritySchema, z.literal("off")]);

// Placeholder detection schema
export const PlaceholderConfigSchema = z.object({
  /** Include the built-in patterns ({{...}}, TBD, XXX, ...) */
  useDefaults: z.boolean().default(true),
  /** Extra regular expression sources, matched outside code */
  patterns: z.array(z.string().refine(isValidPattern, "Invalid regular expression")).default([]),
});

// Column formula schema
export const TableFormulaSchema = z
  .object({
    /** Header of the column holding the stated result */
    column: z.string().min(1),
    /** Formula over other columns, e.g. "{Hunger} + {Saturation}" */
    formula: z.string().min(1),
    /** Restrict to matching guide paths (glob, relative to the guide root) */
    files: z.array(z.string()).optional(),
  })
  .superRefine((value, ctx) => {
    try {
      parseFormula(value.formula);
    } catch (error) {
      if (!(error instanceof FormulaError)) throw error;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["formula"],
        message: error.message,
      });
    }
  });

// Table arithmetic schema
export const TableConfigSchema = z.object({
  formulas: z.array(TableFormulaSchema).default([]),
  /** Check "Total" columns as the sum of the numeric columns before them */
  autoTotals: z.boolean().default(true),
  /** Absolute tolerance when comparing computed and stated values */
  tolerance: z.number().min(0).max(1000).default(0.01),
});

// Table of contents schema
export const TocConfigSchema = z
  .object({
    minLevel: z.number().int().min(1).max(6).default(2),
    maxLevel: z.number().int().min(1).max(6).default(3),
  })
  .refine((value) => value.minLevel <= value.maxLevel, {
    message: "toc.minLevel must not exceed toc.maxLevel",
  });

// Citation tooling schema
export const CitationConfigSchema = z.object({
  /** Citation database JSON (default: bundled data/citations.json) */
  database: z.string().optional(),
  /** Files to process, relative to the guide root (default: every guide) */
  files: z.array(z.string()).optional(),
});

// Main configuration schema
export const GuideCheckConfigSchema = z.object({
  $schema: z.string().optional(),

  /** Directory holding the guides, relative to the config file or cwd */
  guidesDir: z.string().default("docs/agent-guides"),

  /** Index document inside guidesDir */
  indexFile: z.string().default("GUIDE_INDEX.md"),

  recursive: z.boolean().default(false),

  /** Glob patterns (relative to guidesDir) excluded from checking */
  ignore: z.array(z.string()).default([]),

  /** Per-rule severity override, or "off" */
  rules: z.record(z.string(), RuleSettingSchema).default({}),

  placeholders: PlaceholderConfigSchema.default({}),
  tables: TableConfigSchema.default({}),
  toc: TocConfigSchema.default({}),
  citations: CitationConfigSchema.default({}),
});

export type Severity = z.infer<typeof SeveritySchema>;
export type RuleSetting = z.infer<typeof RuleSettingSchema>;
export type GuideCheckConfig = z.infer<typeof GuideCheckConfigSchema>;
export type PlaceholderConfig = z.infer<typeof PlaceholderConfigSchema>;
export type TableFormula = z.infer<typeof TableFormulaSchema>;
export type TableConfig = z.infer<typeof TableConfigSchema>;
export type TocConfig = z.infer<typeof TocConfigSchema>;
export type CitationConfig = z.infer<typeof CitationConfigSchema>;

// Default configuration
export const DEFAULT_CONFIG: GuideCheckConfig = GuideCheckConfigSchema.parse({});
