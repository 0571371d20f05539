// ============================================================================
// RUTA: src/presentation/events/interactionCreate.ts
// ============================================================================

import type { ChatInputCommandInteraction, Interaction } from 'discord.js';
import { DiscordAPIError, Events, MessageFlags } from 'discord.js';
import { RESTJSONErrorCodes } from 'discord-api-types/v10';

import { commandCatalog } from '@/presentation/commands';
import { embedFactory } from '@/presentation/embeds/EmbedFactory';
import type { EventDescriptor } from '@/presentation/events/types';
import { mapErrorToDiscordResponse } from '@/shared/errors/discord-error-mapper';
import { logger } from '@/shared/logger/pino';

const handleChatInput = async (interaction: ChatInputCommandInteraction): Promise<void> => {
  const command = commandCatalog.findSlash(interaction.commandName);

  if (!command) {
    logger.warn({ commandName: interaction.commandName }, 'Received an unregistered slash command.');

    await interaction.reply({
      embeds: [
        embedFactory.warning({
          title: 'Command unavailable',
          description: 'This command is no longer registered. Use `/help` for the current list.',
        }),
      ],
      flags: MessageFlags.Ephemeral,
    });

    return;
  }

  logger.debug({ commandName: interaction.commandName, userId: interaction.user.id }, 'Running slash command.');
  await command.execute(interaction);
};

export const interactionCreateEvent: EventDescriptor<typeof Events.InteractionCreate> = {
  name: Events.InteractionCreate,
  once: false,
  async execute(interaction: Interaction): Promise<void> {
    if (!interaction.isChatInputCommand()) {
      return;
    }

    try {
      await handleChatInput(interaction);
    } catch (error) {
      if (error instanceof DiscordAPIError && error.code === RESTJSONErrorCodes.UnknownInteraction) {
        logger.warn({ commandName: interaction.commandName }, 'Interaction expired before it could be answered.');
        return;
      }

      logger.error({ err: error, commandName: interaction.commandName }, 'Slash command failed.');

      const payload = { embeds: [mapErrorToDiscordResponse(error)], flags: MessageFlags.Ephemeral } as const;
      if (interaction.replied || interaction.deferred) {
        await interaction.followUp(payload);
      } else {
        await interaction.reply(payload);
      }
    }
  },
};
