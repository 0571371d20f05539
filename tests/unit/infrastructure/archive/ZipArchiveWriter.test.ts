import AdmZip from 'adm-zip';
import { describe, expect, it } from 'vitest';

import { createEmptySnapshot, type JsonValue, type Snapshot } from '@/domain/entities/Snapshot';
import { encodeSnapshot } from '@/infrastructure/archive/snapshotEncoder';
import { ZipArchiveWriter } from '@/infrastructure/archive/ZipArchiveWriter';
import { ArchiveEncodingError } from '@/shared/errors/domain.errors';
import { createMockLogger } from '@tests/helpers/discordStubs';

const FILE_NAME = 'backup_Test_Guild_2024-01-02_03-04-05.zip';

const buildSnapshot = (): Snapshot => ({
  info: { id: '876543210987654321', name: 'Café ☕', features: ['COMMUNITY'] },
  members: {
    '600000000000000001': {
      name: 'alice',
      display_name: 'Alice',
      roles: ['@everyone'],
      joined_at: 'None',
      bot: false,
    },
  },
  channels: {
    general: [
      {
        id: '9000',
        content: 'héllo',
        author: { name: 'alice', id: '600000000000000001', bot: false },
        created_at: '2024-01-01T00:00:00.000Z',
        attachments: [],
        embeds: [],
        reactions: [{ emoji: '🎉', count: 2 }],
        pinned: false,
        type: 'Default',
      },
    ],
    random: [],
  },
});

class Unprintable {
  public [Symbol.toPrimitive](): never {
    throw new Error('no string form');
  }

  public toString(): never {
    throw new Error('no string form');
  }
}

describe('encodeSnapshot', () => {
  it('writes four-space indented UTF-8 JSON without escaping non-ASCII text', () => {
    const text = encodeSnapshot(buildSnapshot()).toString('utf8');

    expect(text.startsWith('{\n    "info": {\n        "id": "876543210987654321",')).toBe(true);
    expect(text).toContain('"name": "Café ☕"');
  });

  it('writes values without a JSON form as their string form', () => {
    const snapshot = createEmptySnapshot();
    snapshot.info.icon = new URL('https://cdn.example.test/icon.png') as unknown as JsonValue;

    expect(JSON.parse(encodeSnapshot(snapshot).toString('utf8'))).toEqual({
      info: { icon: 'https://cdn.example.test/icon.png' },
      members: {},
      channels: {},
    });
  });

  it('fails with ArchiveEncodingError when a value cannot be turned into text', () => {
    const snapshot = createEmptySnapshot();
    snapshot.info.broken = new Unprintable() as unknown as JsonValue;

    expect(() => encodeSnapshot(snapshot)).toThrow(ArchiveEncodingError);
  });

  it('fails with ArchiveEncodingError on a circular structure', () => {
    const snapshot = createEmptySnapshot();
    const loop: Record<string, unknown> = {};
    loop.self = loop;
    snapshot.info.loop = loop as unknown as JsonValue;

    expect(() => encodeSnapshot(snapshot)).toThrow(ArchiveEncodingError);
  });
});

describe('ZipArchiveWriter', () => {
  it('produces a ZIP with a single JSON entry named after the archive', async () => {
    const snapshot = buildSnapshot();
    const writer = new ZipArchiveWriter(createMockLogger());

    const buffer = await writer.write(snapshot, FILE_NAME);
    const entries = new AdmZip(buffer).getEntries();

    expect(entries).toHaveLength(1);
    expect(entries[0]?.entryName).toBe('backup_Test_Guild_2024-01-02_03-04-05.json');
    expect(JSON.parse(entries[0]?.getData().toString('utf8') ?? '')).toEqual(snapshot);
  });

  it('keeps an empty snapshot decodable', async () => {
    const buffer = await new ZipArchiveWriter(createMockLogger()).write(createEmptySnapshot(), FILE_NAME);
    const [entry] = new AdmZip(buffer).getEntries();

    expect(JSON.parse(entry?.getData().toString('utf8') ?? '')).toEqual({ info: {}, members: {}, channels: {} });
  });

  it('rejects before producing any bytes when the snapshot cannot be encoded', async () => {
    const snapshot = createEmptySnapshot();
    snapshot.info.broken = new Unprintable() as unknown as JsonValue;

    await expect(new ZipArchiveWriter(createMockLogger()).write(snapshot, FILE_NAME)).rejects.toBeInstanceOf(
      ArchiveEncodingError,
    );
  });
});
