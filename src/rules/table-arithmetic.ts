/**
 * Table arithmetic rule
 *
 * Numeric table data must agree with itself: a result column equals its
 * formula applied to the other columns of the same row. Inconsistent rows
 * are reported, never rewritten.
 *
 * Formulas come from config (`tables.formulas`). With `tables.autoTotals`,
 * a column headed "Total ..." or "... Total" is also checked as the sum of
 * the numeric columns to its left, unless a configured formula covers it.
 */

import type { GuideDocument, MarkdownTable, TableRow } from "../markdown/types";
import { extractInlineText } from "../markdown/inline";
import { normalizeHeader, parseNumber } from "../markdown/tables";
import { evaluateFormula, parseFormula, referencedColumns, roundTo, valuesMatch } from "../formula";
import type { FormulaNode } from "../formula";
import type { TableFormula } from "../config/schema";
import { FormulaError } from "../errors";
import { matchesAny } from "../checker/glob";
import type { GuideRule, RuleFinding } from "./types";

interface ColumnCheck {
  resultIndex: number;
  resultHeader: string;
  ast: FormulaNode;
  formula: string;
}

const TOTAL_HEADER = /^total\b|\btotal$/;
const LABEL_HEADERS = new Set(["#", "rank", "id", "no", "no.", "year"]);
const MISSING_CELL = /^(?:|-|—|–|n\/a|none)$/i;

export function isTotalHeader(key: string): boolean {
  return TOTAL_HEADER.test(key);
}

/**
 * Columns left of `before` whose every filled cell is a number.
 * Unheaded columns are treated as row labels.
 */
export function numericColumns(table: MarkdownTable, before: number): number[] {
  const columns: number[] = [];

  for (let j = 0; j < before; j++) {
    const key = normalizeHeader(table.header[j] ?? "");
    if (key === "" || LABEL_HEADERS.has(key)) continue;

    let seen = 0;
    let numeric = true;
    for (const row of table.rows) {
      const cell = extractInlineText(row.cells[j] ?? "");
      if (MISSING_CELL.test(cell)) continue;
      if (parseNumber(cell) === null) {
        numeric = false;
        break;
      }
      seen++;
    }

    if (numeric && seen > 0) columns.push(j);
  }

  return columns;
}

function sumFormula(columns: Array<{ name: string; key: string }>): { ast: FormulaNode; formula: string } | null {
  const [first, ...rest] = columns;
  if (!first) return null;

  let ast: FormulaNode = { kind: "column", ...first };
  for (const column of rest) {
    ast = { kind: "binary", op: "+", left: ast, right: { kind: "column", ...column } };
  }
  return { ast, formula: columns.map((column) => `{${column.name}}`).join(" + ") };
}

function rowLabel(row: TableRow, resultIndex: number): string {
  const first = extractInlineText(row.cells[0] ?? "");
  return first && resultIndex !== 0 ? `"${first}"` : `on line ${row.line}`;
}

function formatNumber(value: number, decimals: number): string {
  return String(roundTo(value, decimals));
}

function checkRow(
  doc: GuideDocument,
  keys: string[],
  row: TableRow,
  check: ColumnCheck,
  tolerance: number
): RuleFinding | null {
  const stated = parseNumber(row.cells[check.resultIndex] ?? "");
  if (!stated) return null;

  const values = new Map<string, number>();
  let decimals = stated.decimals;
  for (const key of referencedColumns(check.ast)) {
    const parsed = parseNumber(row.cells[keys.indexOf(key)] ?? "");
    if (!parsed) return null;
    values.set(key, parsed.value);
    decimals = Math.max(decimals, parsed.decimals);
  }

  let computed: number;
  try {
    computed = evaluateFormula(check.ast, values, check.formula);
  } catch (error) {
    if (!(error instanceof FormulaError)) throw error;
    return {
      file: doc.path,
      line: row.line,
      message: `Row ${rowLabel(row, check.resultIndex)}: cannot evaluate ${check.formula} (${error.message})`,
    };
  }

  if (valuesMatch(computed, stated, { tolerance })) {
    return null;
  }

  const statedText = extractInlineText(row.cells[check.resultIndex] ?? "");
  return {
    file: doc.path,
    line: row.line,
    message:
      `Row ${rowLabel(row, check.resultIndex)}: ${check.resultHeader} is ${statedText}, ` +
      `but ${check.formula} = ${formatNumber(computed, decimals)}`,
  };
}

interface ConfiguredFormula extends TableFormula {
  key: string;
  ast: FormulaNode;
}

function tableChecks(doc: GuideDocument, table: MarkdownTable, configured: ConfiguredFormula[], autoTotals: boolean) {
  const keys = table.header.map(normalizeHeader);
  const checks: ColumnCheck[] = [];

  for (const entry of configured) {
    if (entry.files && !matchesAny(doc.path, entry.files)) continue;
    const resultIndex = keys.indexOf(entry.key);
    if (resultIndex === -1) continue;
    if (!referencedColumns(entry.ast).every((key) => keys.includes(key))) continue;
    checks.push({
      resultIndex,
      resultHeader: extractInlineText(table.header[resultIndex] ?? entry.column),
      ast: entry.ast,
      formula: entry.formula,
    });
  }

  if (autoTotals) {
    keys.forEach((key, index) => {
      if (!isTotalHeader(key) || checks.some((check) => check.resultIndex === index)) return;
      const columns = numericColumns(table, index);
      // Cells are looked up by header key, so summed headers must be unique
      if (columns.length < 2 || columns.some((column) => keys.indexOf(keys[column] ?? "") !== column)) return;
      const sum = sumFormula(
        columns.map((column) => ({
          name: extractInlineText(table.header[column] ?? ""),
          key: keys[column] ?? "",
        }))
      );
      if (!sum) return;
      checks.push({
        resultIndex: index,
        resultHeader: extractInlineText(table.header[index] ?? ""),
        ...sum,
      });
    });
  }

  return { keys, checks };
}

export const tableArithmeticRule: GuideRule = {
  id: "table-arithmetic",
  description: "Computed table columns agree with the columns they are derived from",
  defaultSeverity: "warning",
  check({ set, config }) {
    const { formulas, autoTotals, tolerance } = config.tables;
    const configured: ConfiguredFormula[] = formulas.map((entry) => ({
      ...entry,
      key: normalizeHeader(entry.column),
      ast: parseFormula(entry.formula),
    }));

    const findings: RuleFinding[] = [];

    for (const doc of set.documents.values()) {
      for (const table of doc.tables) {
        // One table that cannot be checked is reported on its own line
        try {
          const { keys, checks } = tableChecks(doc, table, configured, autoTotals);
          for (const check of checks) {
            for (const row of table.rows) {
              const finding = checkRow(doc, keys, row, check, tolerance);
              if (finding) findings.push(finding);
            }
          }
        } catch (error) {
          findings.push({
            file: doc.path,
            line: table.line,
            message: `Table could not be checked: ${error instanceof Error ? error.message : String(error)}`,
          });
        }
      }
    }

    return findings;
  },
};
