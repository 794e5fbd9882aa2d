export { parseFormula, type FormulaNode, type BinaryOperator } from "./parser";
export { evaluateFormula, referencedColumns, valuesMatch, roundTo } from "./evaluate";
