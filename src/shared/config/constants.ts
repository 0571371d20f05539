// ============================================================================
// RUTA: src/shared/config/constants.ts
// ============================================================================

import { constants as zlibConstants } from 'node:zlib';

import { PermissionFlagsBits } from 'discord.js';

export const COLORS = Object.freeze({
  primary: 0x5865f2,
  success: 0x57f287,
  warning: 0xfee75c,
  danger: 0xed4245,
  info: 0x3498db,
});

export const EMBED_LIMITS = Object.freeze({
  title: 256,
  description: 4096,
  fieldName: 256,
  fieldValue: 1024,
  footerText: 2048,
  maxFields: 25,
});

export const DISCORD_PAGE_LIMITS = Object.freeze({
  messages: 100,
  members: 1_000,
});

export const BACKUP_ARCHIVE = Object.freeze({
  filePrefix: 'backup',
  archiveExtension: '.zip',
  entryExtension: '.json',
  jsonIndent: 4,
  compressionLevel: zlibConstants.Z_BEST_COMPRESSION,
});

export const PERMISSIONS = Object.freeze({
  admin: [PermissionFlagsBits.Administrator] as const,
});
