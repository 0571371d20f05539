// ============================================================================
// RUTA: src/index.ts
// ============================================================================

import { Client, GatewayIntentBits } from 'discord.js';

import { registerEvents } from '@/presentation/events';
import { env } from '@/shared/config/env';
import { logger } from '@/shared/logger/pino';

const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMembers,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.MessageContent,
  ],
});

registerEvents(client);

const shutdown = (signal: NodeJS.Signals): void => {
  logger.info({ signal }, 'Shutting down; any backup in progress is discarded.');
  client
    .destroy()
    .catch((error: unknown) => logger.error({ err: error }, 'Error while closing the Discord client.'))
    .finally(() => process.exit(0));
};

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);

client.login(env.DISCORD_TOKEN).catch((error: unknown) => {
  logger.fatal({ err: error }, 'Could not log in to Discord.');
  process.exit(1);
});
