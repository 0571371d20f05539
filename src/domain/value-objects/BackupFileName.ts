// =============================================================================
// RUTA: src/domain/value-objects/BackupFileName.ts
// =============================================================================

import { parse } from 'node:path';

import { BACKUP_ARCHIVE } from '@/shared/config/constants';

const NON_WORD_CHARACTERS = /[^\p{L}\p{N}_]/gu;

const pad = (value: number): string => value.toString().padStart(2, '0');

/** `YYYY-MM-DD_HH-MM-SS` in the host's local time. */
export const formatBackupTimestamp = (date: Date): string => {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;

  return `${day}_${time}`;
};

export const sanitizeGuildName = (guildName: string): string => guildName.replace(NON_WORD_CHARACTERS, '_');

export const buildBackupFileName = (guildName: string, completedAt: Date): string =>
  `${BACKUP_ARCHIVE.filePrefix}_${sanitizeGuildName(guildName)}_${formatBackupTimestamp(completedAt)}${BACKUP_ARCHIVE.archiveExtension}`;

export const buildArchiveEntryName = (fileName: string): string =>
  `${parse(fileName).name}${BACKUP_ARCHIVE.entryExtension}`;
