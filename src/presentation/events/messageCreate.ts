// ============================================================================
// RUTA: src/presentation/events/messageCreate.ts
// ============================================================================

import { Events, type Message } from 'discord.js';

import { commandCatalog } from '@/presentation/commands';
import { embedFactory } from '@/presentation/embeds/EmbedFactory';
import type { EventDescriptor } from '@/presentation/events/types';
import { env } from '@/shared/config/env';
import { logger } from '@/shared/logger/pino';

export const messageCreateEvent: EventDescriptor<typeof Events.MessageCreate> = {
  name: Events.MessageCreate,
  once: false,
  async execute(message: Message): Promise<void> {
    if (!message.inGuild() || message.author.bot) {
      return;
    }

    const prefix = env.COMMAND_PREFIX;

    if (!message.content.startsWith(prefix)) {
      return;
    }

    const [rawName, ...args] = message.content.slice(prefix.length).trim().split(/\s+/u);
    if (!rawName) {
      return;
    }

    const commandName = rawName.toLowerCase();
    const command = commandCatalog.findPrefix(commandName);

    if (!command) {
      logger.debug({ commandName }, 'Unknown prefix command.');
      await message.reply({
        embeds: [
          embedFactory.warning({
            title: 'Command unavailable',
            description: `There is no command called \`${commandName}\`. Use \`${prefix}help\` for the full list.`,
          }),
        ],
        allowedMentions: { repliedUser: false },
      });
      return;
    }

    try {
      logger.debug({ commandName, userId: message.author.id }, 'Running prefix command.');
      await command.execute(message, args);
    } catch (error) {
      logger.error({ err: error, commandName, userId: message.author.id }, 'Prefix command failed.');

      await message.reply({
        embeds: [
          embedFactory.error({
            title: 'Command failed',
            description: 'An unexpected error occurred. Try again in a few seconds.',
          }),
        ],
        allowedMentions: { repliedUser: false },
      });
    }
  },
};
