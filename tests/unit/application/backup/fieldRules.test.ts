import type { Guild } from 'discord.js';
import { describe, expect, it } from 'vitest';

import { extractFields, type FieldRule, GUILD_INFO_FIELDS } from '@/application/backup/fieldRules';
import { createGuildStub, GUILD_ID } from '@tests/helpers/discordStubs';

interface Source {
  readonly name: string;
  readonly createdAt: Date;
}

describe('extractFields', () => {
  it('collects each rule under its own key and reports rules that throw', () => {
    const failure = new Error('not cached');
    const rules: ReadonlyArray<FieldRule<Source>> = [
      { name: 'name', read: (source) => source.name },
      { name: 'created_at', read: (source) => source.createdAt },
      {
        name: 'owner',
        read: () => {
          throw failure;
        },
      },
      { name: 'callback', read: () => () => undefined },
    ];

    const { values, skipped } = extractFields({ name: 'Guild', createdAt: new Date('2021-01-01T00:00:00.000Z') }, rules);

    expect(values).toEqual({ name: 'Guild', created_at: '2021-01-01T00:00:00.000Z' });
    expect(skipped).toEqual([{ field: 'owner', error: failure }]);
  });

  it('reads only the listed guild attributes', () => {
    const guild: Guild = createGuildStub();

    const { values, skipped } = extractFields(guild, GUILD_INFO_FIELDS);

    expect(values).toEqual({
      id: GUILD_ID,
      name: 'Test Guild',
      description: null,
      icon: 'https://cdn.example.test/icons/guild.png',
      owner_id: '222222222222222222',
      member_count: 0,
      created_at: '2020-02-02T10:00:00.000Z',
      features: ['COMMUNITY'],
    });
    expect(skipped.map(({ field }) => field)).toEqual(['banner', 'splash', 'discovery_splash']);
    expect(Object.keys(values)).not.toContain('members');
    expect(Object.keys(values)).not.toContain('channels');
  });
});
