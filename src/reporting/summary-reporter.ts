/**
 * Terminal summary of a refinement or evaluation run.
 *
 * Box-drawing frame with chalk colors, printed to stdout at the end of a
 * CLI command.
 */

import chalk from 'chalk';
import type { RefinementStatus } from '@/refinement/controller.js';
import type { RuleBatch } from '@/types/detection-rule.js';
import type { RuleMetrics } from '@/types/evaluation.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface RuleSummaryRow {
  id: string;
  name: string;
  precision: number;
  recall: number;
  f1: number;
}

export interface SummaryData {
  title: string;
  source: string;
  status: RefinementStatus | 'evaluated' | 'backend_unavailable';
  backend: string;
  durationMs: number;
  iterations?: number;
  generatorInvocations?: number;
  /** Iteration whose rules are reported. */
  selectedIteration?: number;
  thresholds: { minPrecision: number; minRecall: number };
  aggregate?: { precision: number; recall: number; f1: number; accuracy: number };
  rules: RuleSummaryRow[];
  cost?: { totalUsd: number; totalTokens: number };
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Fixed width of the summary box interior (between the box edges). */
const BOX_WIDTH = 60;

const STATUS_LABELS: Record<SummaryData['status'], string> = {
  accepted: 'ACCEPTED',
  exhausted_retries: 'BEST EFFORT (thresholds not met)',
  skipped_no_backend: 'SKIPPED (no evaluation backend)',
  generator_contract_violation: 'FAILED (generator contract violation)',
  evaluated: 'EVALUATED',
  backend_unavailable: 'SKIPPED (no evaluation backend)',
};

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function formatSummaryTable(data: SummaryData): string {
  const separator = chalk.cyan(`╠${''.padStart(BOX_WIDTH, '═')}╣`);
  const lines: string[] = [];

  lines.push(chalk.cyan(`╔${''.padStart(BOX_WIDTH, '═')}╗`));
  lines.push(formatCenteredLine(data.title, true));
  lines.push(separator);

  lines.push(formatLine(`Source: ${truncate(data.source, BOX_WIDTH - 10)}`));
  lines.push(formatLine(`Backend: ${data.backend}  │  Time: ${formatDuration(data.durationMs)}`));
  lines.push(formatLineRaw(`Status: ${colorizeStatus(data.status)}`));
  if (data.iterations !== undefined) {
    const selected = data.selectedIteration !== undefined ? `  │  Reported: #${data.selectedIteration}` : '';
    lines.push(formatLine(`Iterations: ${data.iterations}  │  Generator calls: ${data.generatorInvocations ?? 0}${selected}`));
  }

  lines.push(separator);
  lines.push(formatSectionHeader('QUALITY'));
  lines.push(
    formatLine(
      `  Targets: precision >= ${pct(data.thresholds.minPrecision)}  │  recall >= ${pct(data.thresholds.minRecall)}`,
    ),
  );
  if (data.aggregate) {
    const a = data.aggregate;
    lines.push(
      formatLineRaw(
        `  Precision: ${colorizeAgainst(a.precision, data.thresholds.minPrecision)}  │  ` +
          `Recall: ${colorizeAgainst(a.recall, data.thresholds.minRecall)}  │  F1: ${pct(a.f1)}`,
      ),
    );
  } else {
    lines.push(formatLine('  No scored iteration'));
  }

  if (data.rules.length > 0) {
    lines.push(separator);
    lines.push(formatSectionHeader('RULES'));
    for (const rule of data.rules) {
      const scores = `P ${pct(rule.precision)}  R ${pct(rule.recall)}  F1 ${pct(rule.f1)}`;
      const name = truncate(rule.name, BOX_WIDTH - 4 - scores.length - 2);
      lines.push(formatLine(`  ${name.padEnd(BOX_WIDTH - 4 - scores.length)}${scores}`));
    }
  }

  if (data.cost) {
    lines.push(separator);
    lines.push(formatSectionHeader('COST'));
    lines.push(formatLine(`  Total: $${data.cost.totalUsd.toFixed(3)}  │  Tokens: ${formatNumber(data.cost.totalTokens)}`));
  }

  lines.push(chalk.cyan(`╚${''.padStart(BOX_WIDTH, '═')}╝`));
  return lines.join('\n');
}

/**
 * One row per rule in batch order. Rules without metrics are left out.
 */
export function ruleSummaryRows(batch: RuleBatch, ruleMetrics: readonly RuleMetrics[]): RuleSummaryRow[] {
  const byId = new Map(ruleMetrics.map((m) => [m.ruleId, m]));
  const rows: RuleSummaryRow[] = [];
  for (const rule of batch.rules) {
    const metrics = byId.get(rule.id);
    if (!metrics) continue;
    rows.push({ id: rule.id, name: rule.name, precision: metrics.precision, recall: metrics.recall, f1: metrics.f1 });
  }
  return rows;
}

export function printSummary(data: SummaryData): void {
  console.log(formatSummaryTable(data));
}

// ---------------------------------------------------------------------------
// Formatting Helpers
// ---------------------------------------------------------------------------

function formatLine(text: string): string {
  const padded = text.padEnd(BOX_WIDTH - 2);
  return `${chalk.cyan('║')} ${padded} ${chalk.cyan('║')}`;
}

/**
 * Like formatLine, for text that already carries ANSI codes: padding is
 * computed from the visible length.
 */
function formatLineRaw(text: string): string {
  const paddingNeeded = BOX_WIDTH - 2 - stripAnsi(text).length;
  const padding = paddingNeeded > 0 ? ' '.repeat(paddingNeeded) : '';
  return `${chalk.cyan('║')} ${text}${padding} ${chalk.cyan('║')}`;
}

function formatCenteredLine(text: string, isBold: boolean = false): string {
  const totalPadding = Math.max(0, BOX_WIDTH - 2 - text.length);
  const leftPad = Math.floor(totalPadding / 2);
  const padded = ' '.repeat(leftPad) + text + ' '.repeat(totalPadding - leftPad);
  const styled = isBold ? chalk.bold.white(padded) : padded;
  return `${chalk.cyan('║')} ${styled} ${chalk.cyan('║')}`;
}

function formatSectionHeader(text: string): string {
  const padded = text.padEnd(BOX_WIDTH - 2);
  return `${chalk.cyan('║')} ${chalk.cyan.bold(padded)} ${chalk.cyan('║')}`;
}

function colorizeStatus(status: SummaryData['status']): string {
  const label = STATUS_LABELS[status];
  if (status === 'accepted' || status === 'evaluated') return chalk.green(label);
  if (status === 'generator_contract_violation') return chalk.red(label);
  return chalk.yellow(label);
}

/**
 * Green at or above the threshold, yellow within 10 points, red otherwise.
 */
function colorizeAgainst(value: number, threshold: number): string {
  const text = pct(value);
  if (value >= threshold) return chalk.green(text);
  if (value >= threshold - 0.1) return chalk.yellow(text);
  return chalk.red(text);
}

function pct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.substring(0, Math.max(0, max - 3))}...`;
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}

function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}
