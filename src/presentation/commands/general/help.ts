// ============================================================================
// RUTA: src/presentation/commands/general/help.ts
// ============================================================================

import { type EmbedBuilder, MessageFlags, SlashCommandBuilder } from 'discord.js';

import type { Command } from '@/presentation/commands/types';
import { embedFactory } from '@/presentation/embeds/EmbedFactory';
import { env } from '@/shared/config/env';
import { clampEmbedField } from '@/shared/utils/discord.utils';

const buildFieldValue = (commands: ReadonlyArray<Command>): string =>
  commands
    .map((command) => {
      const base = `• **/${command.data.name}** — ${command.data.description}`;
      const examples = command.examples?.length
        ? `\n   Examples: ${command.examples.map((example) => `\`${example}\``).join(', ')}`
        : '';
      return `${base}${examples}`;
    })
    .join('\n');

export const createHelpEmbed = (commands: ReadonlyArray<Command>): EmbedBuilder => {
  const grouped = new Map<string, Command[]>();

  for (const command of commands) {
    const category = command.category ?? 'General';
    const bucket = grouped.get(category) ?? [];
    bucket.push(command);
    grouped.set(category, bucket);
  }

  const fields = [...grouped.entries()]
    .sort(([categoryA], [categoryB]) => categoryA.localeCompare(categoryB))
    .map(([category, categoryCommands]) => ({
      name: category,
      value: clampEmbedField(buildFieldValue(categoryCommands)),
    }));

  return embedFactory.info({
    title: '📚 Available commands',
    description: `Every command also works as text with the \`${env.COMMAND_PREFIX}\` prefix.`,
    fields,
  });
};

/** `listCommands` is called each time the help is shown. */
export const createHelpCommand = (listCommands: () => ReadonlyArray<Command>): Command => ({
  data: new SlashCommandBuilder().setName('help').setDescription('Lists the available commands.'),
  category: 'General',
  examples: ['/help', `${env.COMMAND_PREFIX}help`],
  prefix: {
    name: 'help',
    async execute(message) {
      await message.reply({
        embeds: [createHelpEmbed(listCommands())],
        allowedMentions: { repliedUser: false },
      });
    },
  },
  async execute(interaction) {
    await interaction.reply({
      embeds: [createHelpEmbed(listCommands())],
      flags: MessageFlags.Ephemeral,
    });
  },
});
