export { buildRunReport, buildEvaluationReport, generateJsonReport, writeRunReport, summarizeEvaluation } from './json-reporter.js';
export type { RunReport, EvaluationReport, EvaluationReportInput, RunReportContext, IterationReport, EvaluationSummary } from './json-reporter.js';
export { formatSummaryTable, printSummary, ruleSummaryRows } from './summary-reporter.js';
export type { SummaryData, RuleSummaryRow } from './summary-reporter.js';
export { writeRuleFiles, serializeRule, ruleFileName } from './rule-writer.js';
