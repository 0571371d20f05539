import { describe, expect, it } from 'vitest';

import { commandCatalog } from '@/presentation/commands';
import { createHelpEmbed } from '@/presentation/commands/general/help';

describe('help command', () => {
  it('groups the catalog commands by category', () => {
    const embed = createHelpEmbed(commandCatalog.commands).toJSON();

    expect(embed.title).toBe('📚 Available commands');
    expect(embed.fields?.map((field) => field.name)).toEqual(['Administration', 'General']);
    expect(embed.fields?.[0]?.value).toContain('**/backup**');
    expect(embed.fields?.[1]?.value).toContain('**/help**');
  });
});
