export { formatText, formatJson, summaryLine, type TextReportOptions, type JsonReport } from "./formatter";
