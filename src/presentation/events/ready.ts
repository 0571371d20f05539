// ============================================================================
// RUTA: src/presentation/events/ready.ts
// ============================================================================

import { resolve } from 'node:path';

import { type Client, Events, REST, Routes } from 'discord.js';

import { commandCatalog } from '@/presentation/commands';
import type { EventDescriptor } from '@/presentation/events/types';
import { env } from '@/shared/config/env';
import { logger } from '@/shared/logger/pino';

export const readyEvent: EventDescriptor<typeof Events.ClientReady> = {
  name: Events.ClientReady,
  once: true,
  async execute(client: Client<true>): Promise<void> {
    logger.info(
      { botTag: client.user.tag, botId: client.user.id, backupDirectory: resolve(env.BACKUP_DIRECTORY) },
      'Bot connected; backups will be written to the backup directory.',
    );

    const body = commandCatalog.toRegistrationBody();
    const rest = new REST().setToken(env.DISCORD_TOKEN);

    if (env.DISCORD_GUILD_ID) {
      await rest.put(Routes.applicationGuildCommands(env.DISCORD_CLIENT_ID, env.DISCORD_GUILD_ID), { body });
      logger.info({ guildId: env.DISCORD_GUILD_ID, commands: body.length }, 'Slash commands registered on the guild.');
      return;
    }

    await rest.put(Routes.applicationCommands(env.DISCORD_CLIENT_ID), { body });
    logger.info({ commands: body.length }, 'Global slash commands registered.');
  },
};
