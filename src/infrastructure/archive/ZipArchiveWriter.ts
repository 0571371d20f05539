// ============================================================================
// RUTA: src/infrastructure/archive/ZipArchiveWriter.ts
// ============================================================================

import { PassThrough } from 'node:stream';

import archiver from 'archiver';
import type { Logger } from 'pino';

import type { Snapshot } from '@/domain/entities/Snapshot';
import type { IArchiveWriter } from '@/domain/services/IArchiveWriter';
import { buildArchiveEntryName } from '@/domain/value-objects/BackupFileName';
import { encodeSnapshot } from '@/infrastructure/archive/snapshotEncoder';
import { BACKUP_ARCHIVE } from '@/shared/config/constants';

/**
 * Zips the snapshot into a buffer. Nothing touches the disk here, so an
 * interrupted job never leaves a half-written or locked file behind.
 */
export class ZipArchiveWriter implements IArchiveWriter {
  public constructor(private readonly logger: Logger) {}

  public async write(snapshot: Readonly<Snapshot>, fileName: string): Promise<Buffer> {
    const payload = encodeSnapshot(snapshot);
    const entryName = buildArchiveEntryName(fileName);

    const archive = archiver('zip', { zlib: { level: BACKUP_ARCHIVE.compressionLevel } });
    const sink = new PassThrough();
    const chunks: Buffer[] = [];

    const collected = new Promise<Buffer>((resolve, reject) => {
      sink.on('data', (chunk: Buffer) => chunks.push(chunk));
      sink.on('end', () => resolve(Buffer.concat(chunks)));
      sink.on('error', reject);
      archive.on('error', reject);
      archive.on('warning', reject);
    });

    archive.pipe(sink);
    archive.append(payload, { name: entryName });

    const [buffer] = await Promise.all([collected, archive.finalize()]);

    this.logger.debug(
      { entryName, jsonBytes: payload.length, archiveBytes: buffer.length },
      'Backup archive built in memory.',
    );

    return buffer;
  }
}
