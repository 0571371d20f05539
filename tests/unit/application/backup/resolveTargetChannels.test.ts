import { ChannelType } from 'discord.js';
import { describe, expect, it } from 'vitest';

import { resolveTargetChannels } from '@/application/backup/resolveTargetChannels';
import { createChannelStub, createGuildStub } from '@tests/helpers/discordStubs';

const guild = createGuildStub({
  channels: [
    createChannelStub({ id: '30', name: 'third', position: 2 }),
    createChannelStub({ id: '11', name: 'first-b', position: 0 }),
    createChannelStub({ id: '10', name: 'first-a', position: 0 }),
    createChannelStub({ id: '40', name: 'voice', position: 1, type: ChannelType.GuildVoice }),
    createChannelStub({ id: '50', name: 'announcements', position: 3, type: ChannelType.GuildAnnouncement }),
  ],
});

describe('resolveTargetChannels', () => {
  it('returns the text and announcement channels in sidebar order for "all"', () => {
    expect(resolveTargetChannels(guild, { kind: 'all' }).map((channel) => channel.name)).toEqual([
      'first-a',
      'first-b',
      'third',
      'announcements',
    ]);
  });

  it('archives announcement channels alongside regular ones', () => {
    const mixed = createGuildStub({
      channels: [
        createChannelStub({ id: '2', name: 'news', position: 1, type: ChannelType.GuildAnnouncement }),
        createChannelStub({ id: '1', name: 'general', position: 0 }),
      ],
    });

    expect(resolveTargetChannels(mixed, { kind: 'all' }).map((channel) => channel.name)).toEqual(['general', 'news']);
  });

  it('resolves a mention, a raw id or any token containing the id', () => {
    expect(resolveTargetChannels(guild, { kind: 'channel', token: '<#30>' }).map((channel) => channel.id)).toEqual([
      '30',
    ]);
    expect(resolveTargetChannels(guild, { kind: 'channel', token: '11' }).map((channel) => channel.id)).toEqual([
      '11',
    ]);
  });

  it('accepts a text-based channel of another kind when named explicitly', () => {
    expect(resolveTargetChannels(guild, { kind: 'channel', token: '50' }).map((channel) => channel.id)).toEqual([
      '50',
    ]);
  });

  it('returns nothing for unknown or non-text targets', () => {
    expect(resolveTargetChannels(guild, { kind: 'channel', token: 'abc' })).toEqual([]);
    expect(resolveTargetChannels(guild, { kind: 'channel', token: '999' })).toEqual([]);
    expect(resolveTargetChannels(guild, { kind: 'channel', token: '40' })).toEqual([]);
  });
});
