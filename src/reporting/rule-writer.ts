/**
 * Writes rules as YAML files, one per rule, in the format the rule loader
 * reads back.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { toRuleDocument } from '@/generation/rule-schema.js';
import type { Rule } from '@/types/detection-rule.js';
import { serializeYaml } from '@/utils/yaml.js';

export function serializeRule(rule: Rule): string {
  return serializeYaml(toRuleDocument(rule));
}

/**
 * File name for a rule: its id reduced to safe characters.
 */
export function ruleFileName(rule: Rule): string {
  const stem = rule.id.toLowerCase().replace(/[^a-z0-9._-]+/g, '-').replace(/^-+|-+$/g, '');
  return `${stem || 'rule'}.yml`;
}

/**
 * Write every rule into `outputDir`. Returns the written paths.
 */
export function writeRuleFiles(rules: readonly Rule[], outputDir: string): string[] {
  mkdirSync(outputDir, { recursive: true });
  return rules.map((rule) => {
    const path = join(outputDir, ruleFileName(rule));
    writeFileSync(path, serializeRule(rule), 'utf-8');
    return path;
  });
}
