import { describe, expect, it, vi } from 'vitest';

import { RosterCollector } from '@/application/services/RosterCollector';
import { createGuildStub, createMemberStub, createMockLogger } from '@tests/helpers/discordStubs';

describe('RosterCollector', () => {
  it('pages through the whole member list keyed by member id', async () => {
    const members = ['100', '200', '300', '400', '500'].map((id) => createMemberStub({ id }));
    const guild = createGuildStub({ members });
    const collector = new RosterCollector(createMockLogger(), { pageSize: 2 });

    const roster = await collector.collect(guild);

    expect(Object.keys(roster)).toEqual(['100', '200', '300', '400', '500']);
    expect(guild.members.list).toHaveBeenCalledTimes(3);
    expect(guild.members.list).toHaveBeenNthCalledWith(1, { limit: 2, after: undefined, cache: false });
    expect(guild.members.list).toHaveBeenNthCalledWith(2, { limit: 2, after: '200', cache: false });
    expect(guild.members.list).toHaveBeenNthCalledWith(3, { limit: 2, after: '400', cache: false });
  });

  it('builds member records with roles ordered by position', async () => {
    const guild = createGuildStub({
      members: [
        createMemberStub({
          id: '600',
          username: 'bob',
          displayName: 'Bobby',
          roles: [
            { name: 'Moderator', position: 5 },
            { name: '@everyone', position: 0 },
            { name: 'Member', position: 1 },
          ],
          bot: true,
        }),
        createMemberStub({ id: '700', username: 'carol', joinedAt: null }),
      ],
    });

    const roster = await new RosterCollector(createMockLogger()).collect(guild);

    expect(roster).toEqual({
      '600': {
        name: 'bob',
        display_name: 'Bobby',
        roles: ['@everyone', 'Member', 'Moderator'],
        joined_at: '2023-05-01T12:00:00.000Z',
        bot: true,
      },
      '700': { name: 'carol', display_name: 'carol', roles: [], joined_at: 'None', bot: false },
    });
  });

  it('never asks Discord for more than 1000 members per page', async () => {
    const guild = createGuildStub({ members: [createMemberStub({ id: '1' })] });

    await new RosterCollector(createMockLogger(), { pageSize: 5_000 }).collect(guild);

    expect(guild.members.list).toHaveBeenCalledWith({ limit: 1_000, after: undefined, cache: false });
  });

  it('propagates a failed page', async () => {
    const failure = new Error('Missing GUILD_MEMBERS intent');
    const guild = createGuildStub({
      listMembers: vi.fn(async () => {
        throw failure;
      }),
    });

    await expect(new RosterCollector(createMockLogger()).collect(guild)).rejects.toBe(failure);
  });
});
