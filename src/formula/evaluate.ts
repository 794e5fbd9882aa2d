import { FormulaError } from "../errors";
import type { FormulaNode } from "./parser";

/**
 * Evaluate a formula against a row keyed by normalized header.
 */
export function evaluateFormula(node: FormulaNode, row: ReadonlyMap<string, number>, formula = ""): number {
  switch (node.kind) {
    case "number":
      return node.value;
    case "column": {
      const value = row.get(node.key);
      if (value === undefined) {
        throw new FormulaError({ message: `Column {${node.name}} has no numeric value`, formula });
      }
      return value;
    }
    case "negate":
      return -evaluateFormula(node.operand, row, formula);
    case "binary": {
      const left = evaluateFormula(node.left, row, formula);
      const right = evaluateFormula(node.right, row, formula);
      switch (node.op) {
        case "+":
          return left + right;
        case "-":
          return left - right;
        case "*":
          return left * right;
        case "/":
          if (right === 0) {
            throw new FormulaError({ message: "Division by zero", formula });
          }
          return left / right;
      }
    }
  }
}

/**
 * Normalized header keys referenced by a formula, in first-use order.
 */
export function referencedColumns(node: FormulaNode): string[] {
  const keys: string[] = [];
  const visit = (current: FormulaNode): void => {
    switch (current.kind) {
      case "column":
        if (!keys.includes(current.key)) keys.push(current.key);
        return;
      case "negate":
        visit(current.operand);
        return;
      case "binary":
        visit(current.left);
        visit(current.right);
        return;
      case "number":
        return;
    }
  };
  visit(node);
  return keys;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round((value + Math.sign(value) * Number.EPSILON) * factor) / factor;
}

const EPSILON = 1e-9;

/**
 * Compare a computed value with the number stated in a table cell.
 *
 * Matches when the computed value rounds to the stated one at the precision
 * the cell shows, or lies within `tolerance` of it.
 */
export function valuesMatch(
  computed: number,
  stated: { value: number; decimals: number },
  options: { tolerance: number }
): boolean {
  if (Math.abs(roundTo(computed, stated.decimals) - stated.value) <= EPSILON) return true;
  return Math.abs(computed - stated.value) <= options.tolerance + EPSILON;
}
