/**
 * Prompt templates and response parsing for detection rule generation.
 *
 * The model writes Elasticsearch `query_string` rules together with the
 * labeled payloads used to test them. On retries the previous iteration's
 * feedback report is rendered into the user prompt.
 */

import { parseWithSchema } from '@/ai/response-parser.js';
import type { RawRuleBatch } from '@/generation/rule-builder.js';
import { RuleSetDocumentSchema, toRawRuleBatch } from '@/generation/rule-schema.js';
import type { FeedbackReport, RuleFeedback } from '@/types/feedback.js';

// ---------------------------------------------------------------------------
// Response Parser
// ---------------------------------------------------------------------------

/**
 * Parse raw model output into the generator's raw batch shape.
 *
 * @throws When the response cannot be parsed or fails validation.
 */
export function parseRuleGenerationResponse(raw: string): RawRuleBatch {
  const response = parseWithSchema(raw, RuleSetDocumentSchema, 'Rule generation response');
  return toRawRuleBatch(response.rules);
}

// ---------------------------------------------------------------------------
// Prompt Builders
// ---------------------------------------------------------------------------

/**
 * Build the system and user prompts for one generation attempt.
 */
export function buildRuleGenerationPrompt(
  ctiText: string,
  feedback?: FeedbackReport,
): { system: string; user: string } {
  const feedbackBlock = feedback ? `\n\n---\n\n${renderFeedback(feedback)}` : '';

  const user = `Generate detection rules for the threat activity described in this intelligence report.

## Threat Intelligence

${ctiText.trim()}

Respond with ONLY the JSON object.${feedbackBlock}`;

  return { system: SYSTEM_PROMPT, user };
}

/**
 * Render a feedback report as a markdown prompt section.
 */
export function renderFeedback(report: FeedbackReport): string {
  const lines: string[] = [
    `## Refinement Feedback (iteration ${report.iteration})`,
    '',
    `Targets: precision >= ${fmt(report.thresholds.minPrecision)}, recall >= ${fmt(report.thresholds.minRecall)}.`,
    `Batch scored precision ${fmt(report.aggregate.precision)}, recall ${fmt(report.aggregate.recall)}, F1 ${fmt(report.aggregate.f1)}.`,
  ];

  if (report.passingRuleIds.length > 0) {
    lines.push('', `Rules meeting the targets (keep them unchanged): ${report.passingRuleIds.join(', ')}`);
  }

  for (const rule of report.rules) {
    lines.push('', ...renderRuleFeedback(rule));
  }

  lines.push(
    '',
    'Return the complete revised batch: every rule, each with its full set of test cases.',
    'Fix the queries where the hypotheses point at the query; fix the test cases where they point at the data.',
  );

  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Internal Helpers
// ---------------------------------------------------------------------------

function renderRuleFeedback(rule: RuleFeedback): string[] {
  const c = rule.counts;
  const lines = [
    `### ${rule.ruleName} (${rule.ruleId})`,
    '',
    `Query: \`${rule.query}\``,
    `Results: TP=${c.truePositives} FP=${c.falsePositives} TN=${c.trueNegatives} FN=${c.falseNegatives}` +
      (c.erroredCases > 0 ? ` errors=${c.erroredCases}` : '') +
      (c.evasionAnomalies > 0 ? ` evasion-anomalies=${c.evasionAnomalies}` : ''),
  ];

  for (const failing of rule.failingMetrics) {
    lines.push(`- ${failing.metric} ${fmt(failing.value)} is below ${fmt(failing.threshold)}`);
  }

  if (rule.hypotheses.length > 0) {
    lines.push('', 'Likely causes:');
    for (const h of rule.hypotheses) {
      lines.push(`- [${h.category}] ${h.summary} (${h.evidence})`);
    }
  }

  if (rule.misclassified.length > 0) {
    lines.push('', 'Misclassified test cases:');
    for (const m of rule.misclassified) {
      const actual = m.actualMatch === 'indeterminate' ? 'not evaluated' : m.actualMatch ? 'matched' : 'no match';
      const expected = m.expectedMatch ? 'match' : 'no match';
      lines.push(`- ${m.testCaseId} [${m.category}] expected ${expected}, got ${actual}${m.note ? ` (${m.note})` : ''}: ${m.payloadSnippet}`);
    }
  }

  if (rule.suggestions.length > 0) {
    lines.push('', 'Suggested fixes:');
    for (const s of rule.suggestions) {
      lines.push(`- ${s}`);
    }
  }

  return lines;
}

function fmt(value: number): string {
  return value.toFixed(2);
}

const SYSTEM_PROMPT = `You are an expert detection engineer writing rules for an Elasticsearch SIEM.
Your task is to turn threat intelligence into detection rules in JSON format, each with labeled test cases.

## Rule Format

Each rule has:
- **name**: A clear, descriptive name. Use the format: "<Action> <What> via <How/Where>".
- **description**: What the rule detects and why it matters.
- **query**: An Elasticsearch \`query_string\` (Lucene) expression.
- **severity**: One of: low, medium, high, critical.
- **risk_score**: Integer 0-100.
- **mitre**: ATT&CK technique ids, e.g. ["T1490"].
- **test_cases**: Labeled log entries used to measure the rule.

## Query Rules

- Use ECS field names: \`process.name\`, \`process.command_line\`, \`process.parent.name\`, \`file.path\`, \`registry.path\`, \`user.name\`, \`destination.ip\`.
- Combine conditions with \`AND\`, \`OR\`, \`NOT\` and parentheses.
- Use \`*\` wildcards for partial matching, e.g. \`process.command_line:*delete*shadows*\`.
- Escape reserved characters with a backslash: \`\\\\\`, \`/\`, \`:\`, \`(\`, \`)\`, spaces inside values.
- Do NOT use range queries, boosts (\`^\`) or fuzzy (\`~\`) operators.
- Detect the TECHNIQUE BEHAVIOR, not a tool filename that attackers can rename.

## Test Case Categories

- **TP**: the attack as described; the rule MUST match it.
- **FN**: a known evasion variant the rule is NOT expected to catch.
- **FP**: benign activity that looks similar; the rule must NOT match it.
- **TN**: ordinary benign activity; the rule must NOT match it.

Every rule needs at least 2 TP cases and at least 2 FP or TN cases.
Each \`log_entry\` is a JSON document whose field names are exactly the ones the query uses.

## Example

\`\`\`json
{
  "rules": [
    {
      "name": "Shadow Copy Deletion via Vssadmin",
      "description": "Detects deletion of volume shadow copies, a common step before ransomware encryption.",
      "query": "process.name:*vssadmin* AND process.command_line:*delete*shadows*",
      "severity": "high",
      "risk_score": 73,
      "mitre": ["T1490"],
      "test_cases": [
        {"type": "TP", "description": "Quiet deletion of all shadows", "log_entry": {"process": {"name": "vssadmin.exe", "command_line": "vssadmin.exe delete shadows /all /quiet"}}},
        {"type": "FN", "description": "Deletion through WMI", "log_entry": {"process": {"name": "wmic.exe", "command_line": "wmic shadowcopy delete"}}},
        {"type": "FP", "description": "Listing shadows", "log_entry": {"process": {"name": "vssadmin.exe", "command_line": "vssadmin.exe list shadows"}}},
        {"type": "TN", "description": "Explorer start", "log_entry": {"process": {"name": "explorer.exe", "command_line": "explorer.exe"}}}
      ]
    }
  ]
}
\`\`\`

## Output Format

Respond with ONLY a JSON object (no markdown fences, no explanation) matching the structure above.`;
