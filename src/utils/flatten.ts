/**
 * Payload flattening: nested documents become dotted keys, the shape the
 * search backend and the query evaluator both work with.
 *
 *   { process: { name: 'cmd.exe' } }  ->  { 'process.name': 'cmd.exe' }
 */

import type { Payload, PayloadScalar, PayloadValue } from '@/types/detection-rule.js';

export type FlatValue = PayloadScalar | PayloadScalar[];

export type FlatDocument = Record<string, FlatValue>;

export function flattenPayload(payload: Readonly<Payload>): FlatDocument {
  const flat: FlatDocument = {};
  for (const [key, value] of Object.entries(payload)) {
    assign(flat, key, value);
  }
  return flat;
}

function assign(target: FlatDocument, path: string, value: PayloadValue): void {
  if (Array.isArray(value)) {
    for (const item of value) {
      if (isPayloadObject(item)) {
        for (const [key, nested] of Object.entries(item)) {
          assign(target, `${path}.${key}`, nested);
        }
      } else if (Array.isArray(item)) {
        assign(target, path, item);
      } else {
        append(target, path, item);
      }
    }
    return;
  }

  if (isPayloadObject(value)) {
    for (const [key, nested] of Object.entries(value)) {
      assign(target, `${path}.${key}`, nested);
    }
    return;
  }

  append(target, path, value);
}

function append(target: FlatDocument, path: string, value: PayloadScalar): void {
  const existing = target[path];
  if (existing === undefined) {
    target[path] = value;
  } else if (Array.isArray(existing)) {
    existing.push(value);
  } else {
    target[path] = [existing, value];
  }
}

function isPayloadObject(value: PayloadValue): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * All non-null values of a flattened field rendered as strings.
 */
export function fieldValues(doc: FlatDocument, field: string): string[] {
  const raw = doc[field];
  if (raw === undefined) return [];
  const list = Array.isArray(raw) ? raw : [raw];
  return list.filter((v): v is string | number | boolean => v !== null).map(String);
}
