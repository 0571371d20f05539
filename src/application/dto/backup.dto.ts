// ============================================================================
// RUTA: src/application/dto/backup.dto.ts
// ============================================================================

import { z } from 'zod';

export const BACKUP_ALL_TOKEN = 'all';

export const BackupTargetSchema = z
  .string({ required_error: 'A target is required.' })
  .trim()
  .min(1, 'A target is required.')
  .transform((token) =>
    token === BACKUP_ALL_TOKEN
      ? ({ kind: 'all' } as const)
      : ({ kind: 'channel', token } as const),
  );

export type BackupTarget = z.infer<typeof BackupTargetSchema>;
