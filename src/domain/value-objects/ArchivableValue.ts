// =============================================================================
// RUTA: src/domain/value-objects/ArchivableValue.ts
// =============================================================================

import type { JsonObject, JsonPrimitive, JsonValue } from '@/domain/entities/Snapshot';

/**
 * Closed set of value kinds a remote attribute can take once it is read.
 *
 * - `primitive`: already JSON-safe scalars.
 * - `timestamp`: dates, stored as ISO-8601.
 * - `opaque`: handles with a canonical string form (assets, colours, bigints).
 * - `collection`: arrays and plain records, normalized element by element.
 * - `unsupported`: callables, symbols and `undefined`; dropped from the output.
 */
export type ArchivableValue =
  | { readonly kind: 'primitive'; readonly value: JsonPrimitive }
  | { readonly kind: 'timestamp'; readonly value: Date }
  | { readonly kind: 'opaque'; readonly value: bigint | object }
  | { readonly kind: 'collection'; readonly value: ReadonlyArray<unknown> | Readonly<Record<string, unknown>> }
  | { readonly kind: 'unsupported' };

export const isPlainRecord = (value: unknown): value is Record<string, unknown> => {
  if (value === null || typeof value !== 'object') {
    return false;
  }

  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
};

const isList = (value: unknown): value is ReadonlyArray<unknown> => Array.isArray(value);

export const classifyValue = (value: unknown): ArchivableValue => {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return { kind: 'primitive', value };
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? { kind: 'primitive', value } : { kind: 'primitive', value: null };
  }

  if (typeof value === 'bigint') {
    return { kind: 'opaque', value };
  }

  if (value instanceof Date) {
    return { kind: 'timestamp', value };
  }

  if (Array.isArray(value) || isPlainRecord(value)) {
    return { kind: 'collection', value };
  }

  if (typeof value === 'object') {
    return { kind: 'opaque', value };
  }

  return { kind: 'unsupported' };
};

/** `undefined` means the value has no JSON form and must be left out. */
export const toJsonValue = (value: unknown): JsonValue | undefined => {
  const classified = classifyValue(value);

  switch (classified.kind) {
    case 'primitive':
      return classified.value;
    case 'timestamp':
      return Number.isNaN(classified.value.getTime()) ? null : classified.value.toISOString();
    case 'opaque':
      return String(classified.value);
    case 'collection':
      if (isList(classified.value)) {
        return classified.value.map((item) => toJsonValue(item) ?? null);
      }

      return normalizeRecord(classified.value);
    case 'unsupported':
      return undefined;
  }
};

export const normalizeRecord = (record: Readonly<Record<string, unknown>>): JsonObject => {
  const normalized: JsonObject = {};

  for (const [key, value] of Object.entries(record)) {
    const jsonValue = toJsonValue(value);
    if (jsonValue !== undefined) {
      normalized[key] = jsonValue;
    }
  }

  return normalized;
};
