// ============================================================================
// RUTA: src/presentation/events/index.ts
// ============================================================================

import type { Client, ClientEvents } from 'discord.js';

import { interactionCreateEvent } from '@/presentation/events/interactionCreate';
import { messageCreateEvent } from '@/presentation/events/messageCreate';
import { readyEvent } from '@/presentation/events/ready';
import type { EventDescriptor } from '@/presentation/events/types';
import { logger } from '@/shared/logger/pino';

const bindEvent = <K extends keyof ClientEvents>(client: Client, descriptor: EventDescriptor<K>): void => {
  const listener = (...args: ClientEvents[K]): void => {
    descriptor.execute(...args).catch((error: unknown) => {
      logger.error({ err: error, event: descriptor.name }, 'Event handler failed.');
    });
  };

  if (descriptor.once) {
    client.once(descriptor.name, listener);
  } else {
    client.on(descriptor.name, listener);
  }
};

export const registerEvents = (client: Client): void => {
  bindEvent(client, readyEvent);
  bindEvent(client, interactionCreateEvent);
  bindEvent(client, messageCreateEvent);
};
