// ============================================================================
// RUTA: src/infrastructure/storage/LocalBackupStorage.ts
// ============================================================================

import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import type { Logger } from 'pino';

import type { IBackupStorage } from '@/domain/repositories/IBackupStorage';

export class LocalBackupStorage implements IBackupStorage {
  private readonly directory: string;

  /** Relative directories are resolved against the process working directory. */
  public constructor(directory: string, private readonly logger: Logger) {
    this.directory = resolve(directory);
  }

  public get location(): string {
    return this.directory;
  }

  public async save(archive: Buffer, fileName: string): Promise<string> {
    await mkdir(this.directory, { recursive: true });

    const filePath = join(this.directory, fileName);
    await writeFile(filePath, archive);

    this.logger.info({ filePath, bytes: archive.length }, 'Backup archive saved.');

    return filePath;
  }
}
