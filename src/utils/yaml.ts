/**
 * YAML parsing and serialization for rule files.
 */

import { parse, stringify } from 'yaml';

export function parseYaml(input: string): unknown {
  return parse(input);
}

export function serializeYaml(data: unknown): string {
  return stringify(data, {
    lineWidth: 0,
    defaultKeyType: 'PLAIN',
  });
}
