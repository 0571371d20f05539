import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { LocalBackupStorage } from '@/infrastructure/storage/LocalBackupStorage';
import { createMockLogger } from '@tests/helpers/discordStubs';

describe('LocalBackupStorage', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'archivist-storage-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('creates the backup directory and writes the archive into it', async () => {
    const directory = join(root, 'nested', 'backups');
    const storage = new LocalBackupStorage(directory, createMockLogger());
    const archive = Buffer.from([0x50, 0x4b, 0x03, 0x04]);

    const filePath = await storage.save(archive, 'backup_Test_2024-01-02_03-04-05.zip');

    expect(filePath).toBe(join(directory, 'backup_Test_2024-01-02_03-04-05.zip'));
    await expect(readFile(filePath)).resolves.toEqual(archive);
  });

  it('resolves a relative directory against the working directory', () => {
    const storage = new LocalBackupStorage('backups', createMockLogger());

    expect(storage.location).toBe(join(process.cwd(), 'backups'));
  });
});
