// =============================================================================
// RUTA: src/domain/repositories/IBackupStorage.ts
// =============================================================================

export interface IBackupStorage {
  /**
   * Writes the complete archive in one go and returns the absolute path.
   * Names are expected to be unique already; an existing file is overwritten.
   */
  save(archive: Buffer, fileName: string): Promise<string>;
}
