// =============================================================================
// RUTA: src/domain/services/IArchiveWriter.ts
// =============================================================================

import type { Snapshot } from '@/domain/entities/Snapshot';

export interface IArchiveWriter {
  /** Builds the compressed archive for `fileName` entirely in memory. */
  write(snapshot: Readonly<Snapshot>, fileName: string): Promise<Buffer>;
}
