// ============================================================================
// RUTA: src/infrastructure/archive/snapshotEncoder.ts
// ============================================================================

import type { Snapshot } from '@/domain/entities/Snapshot';
import { isPlainRecord } from '@/domain/value-objects/ArchivableValue';
import { BACKUP_ARCHIVE } from '@/shared/config/constants';
import { ArchiveEncodingError } from '@/shared/errors/domain.errors';

const ROOT_KEY = '<root>';

const coerceToString = (key: string, value: unknown): string => {
  try {
    return String(value);
  } catch (error) {
    throw new ArchiveEncodingError(key || ROOT_KEY, error);
  }
};

/**
 * Anything `JSON.stringify` would not write faithfully (class instances,
 * bigints, functions, symbols) is written as its string form instead.
 */
const coerceReplacer = (key: string, value: unknown): unknown => {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (value === undefined || Array.isArray(value) || isPlainRecord(value)) {
    return value;
  }

  return coerceToString(key, value);
};

/** Pretty-printed UTF-8 JSON; non-ASCII characters are kept as they are. */
export const encodeSnapshot = (snapshot: Readonly<Snapshot>): Buffer => {
  let json: string;
  try {
    json = JSON.stringify(snapshot, coerceReplacer, BACKUP_ARCHIVE.jsonIndent);
  } catch (error) {
    if (error instanceof ArchiveEncodingError) {
      throw error;
    }

    throw new ArchiveEncodingError(ROOT_KEY, error);
  }

  return Buffer.from(json, 'utf8');
};
