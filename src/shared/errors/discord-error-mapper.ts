// ============================================================================
// RUTA: src/shared/errors/discord-error-mapper.ts
// ============================================================================

import { RESTJSONErrorCodes } from 'discord-api-types/v10';
import { DiscordAPIError, type EmbedBuilder } from 'discord.js';

import { embedFactory } from '@/presentation/embeds/EmbedFactory';
import { isArchivistError } from '@/shared/errors/base.error';

const ACCESS_DENIED_CODES: ReadonlySet<number | string> = new Set([
  RESTJSONErrorCodes.MissingAccess,
  RESTJSONErrorCodes.MissingPermissions,
]);

const FORBIDDEN_STATUS = 403;

export const isAccessDeniedError = (error: unknown): error is DiscordAPIError =>
  error instanceof DiscordAPIError && (ACCESS_DENIED_CODES.has(error.code) || error.status === FORBIDDEN_STATUS);

export const mapErrorToDiscordResponse = (error: unknown): EmbedBuilder => {
  if (isArchivistError(error) && error.exposeMessage) {
    return embedFactory.error({
      title: 'Backup not completed',
      description: error.message,
    });
  }

  if (isAccessDeniedError(error)) {
    return embedFactory.error({
      title: 'Missing permissions',
      description: 'The bot is not allowed to read what this backup needs.',
    });
  }

  return embedFactory.error({
    title: 'Backup failed',
    description: 'Something went wrong while creating the backup. No archive was written.',
  });
};
