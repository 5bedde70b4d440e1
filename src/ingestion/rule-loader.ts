/**
 * Reads YAML rule files into a validated rule batch.
 *
 * A file holds one rule document or a `rules:` list of them. A directory
 * is read file by file (.yml / .yaml) in name order.
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { buildRuleBatch } from '@/generation/rule-builder.js';
import { RuleDocumentSchema, RuleSetDocumentSchema, toRawRuleBatch } from '@/generation/rule-schema.js';
import type { RuleDocument } from '@/generation/rule-schema.js';
import type { RuleBatch } from '@/types/detection-rule.js';
import { parseYaml } from '@/utils/yaml.js';

/**
 * Load rule documents from a file or directory into a batch.
 *
 * Rules without an `id` get one from their file name.
 *
 * @throws Error naming the file when a document is invalid.
 * @throws GeneratorContractError when the combined batch breaks the contract.
 */
export async function loadRuleFiles(path: string): Promise<RuleBatch> {
  const info = await stat(path);
  const files = info.isDirectory() ? await listRuleFiles(path) : [path];
  if (files.length === 0) {
    throw new Error(`No rule files (.yml, .yaml) found in ${path}`);
  }

  const documents: RuleDocument[] = [];
  for (const file of files) {
    documents.push(...parseRuleFile(await readFile(file, 'utf-8'), file));
  }

  return buildRuleBatch(toRawRuleBatch(documents));
}

/**
 * Parse the content of one rule file.
 */
export function parseRuleFile(content: string, fileName: string): RuleDocument[] {
  let data: unknown;
  try {
    data = parseYaml(content);
  } catch (error) {
    throw new Error(`${fileName}: invalid YAML: ${error instanceof Error ? error.message : String(error)}`);
  }

  const isRuleSet = typeof data === 'object' && data !== null && 'rules' in data;
  const result = isRuleSet
    ? RuleSetDocumentSchema.safeParse(data)
    : RuleDocumentSchema.transform((rule) => ({ rules: [rule] })).safeParse(data);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `  - ${e.path.join('.') || '(root)'}: ${e.message}`);
    throw new Error(`${fileName}: not a rule document:\n${issues.join('\n')}`);
  }

  const stem = basename(fileName, extname(fileName));
  const rules = result.data.rules;
  return rules.map((rule, index) => ({
    ...rule,
    id: rule.id ?? (rules.length === 1 ? stem : `${stem}-${index + 1}`),
  }));
}

async function listRuleFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && ['.yml', '.yaml'].includes(extname(entry.name).toLowerCase()))
    .map((entry) => join(dir, entry.name))
    .sort();
}
