/**
 * Elastic Common Schema field catalogue.
 *
 * A subset of ECS covering the fields detection rules query most often,
 * read once from `ecs-fields.json` beside this module.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export const ECS_FIELD_TYPES = ['keyword', 'wildcard', 'match_only_text', 'date', 'long', 'ip', 'boolean'] as const;

export type EcsFieldType = (typeof ECS_FIELD_TYPES)[number];

export interface EcsCatalog {
  version: string;
  fields: Readonly<Record<string, EcsFieldType>>;
}

export interface EcsFieldCheck {
  known: string[];
  /** Queried fields that are neither ECS nor carried by any payload. */
  unknown: string[];
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

const CatalogSchema = z.object({
  version: z.string(),
  fields: z.record(z.enum(ECS_FIELD_TYPES)),
});

/** Multi-field suffixes ECS adds to some fields. */
const MULTI_FIELD_SUFFIXES = ['.text', '.caseless'];

/** Namespaces ECS leaves open to custom keys. */
const OPEN_NAMESPACES = ['labels.'];

let cached: EcsCatalog | null = null;

export function loadEcsCatalog(): EcsCatalog {
  if (!cached) {
    const path = fileURLToPath(new URL('./ecs-fields.json', import.meta.url));
    cached = CatalogSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
  }
  return cached;
}

// ---------------------------------------------------------------------------
// Lookups
// ---------------------------------------------------------------------------

export function getEcsFieldType(field: string): EcsFieldType | undefined {
  const { fields } = loadEcsCatalog();
  if (field in fields) return fields[field];

  const suffix = MULTI_FIELD_SUFFIXES.find((s) => field.endsWith(s));
  if (suffix) {
    const base = field.slice(0, -suffix.length);
    if (base in fields) return 'match_only_text';
  }
  return undefined;
}

export function isEcsField(field: string): boolean {
  return getEcsFieldType(field) !== undefined || OPEN_NAMESPACES.some((ns) => field.startsWith(ns));
}

/**
 * Split queried fields into those ECS or the payloads account for, and
 * those nothing accounts for.
 */
export function checkQueryFields(fields: Iterable<string>, payloadFields: ReadonlySet<string>): EcsFieldCheck {
  const known: string[] = [];
  const unknown: string[] = [];
  for (const field of fields) {
    (isEcsField(field) || payloadFields.has(field) ? known : unknown).push(field);
  }
  return { known, unknown };
}
