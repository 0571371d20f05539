// ============================================================================
// RUTA: src/presentation/commands/backup/backup.ts
// ============================================================================

import { type Guild, MessageFlags, type PermissionsBitField, SlashCommandBuilder } from 'discord.js';

import { type BackupTarget, BackupTargetSchema } from '@/application/dto/backup.dto';
import { HistoryArchiver } from '@/application/services/HistoryArchiver';
import { RosterCollector } from '@/application/services/RosterCollector';
import {
  type BackupProgressReporter,
  CreateGuildBackupUseCase,
} from '@/application/usecases/backup/CreateGuildBackupUseCase';
import { ZipArchiveWriter } from '@/infrastructure/archive/ZipArchiveWriter';
import { LocalBackupStorage } from '@/infrastructure/storage/LocalBackupStorage';
import { StatusMessageReporter } from '@/presentation/backup/StatusMessageReporter';
import type { Command } from '@/presentation/commands/types';
import { PERMISSIONS } from '@/shared/config/constants';
import { env } from '@/shared/config/env';
import { mapErrorToDiscordResponse } from '@/shared/errors/discord-error-mapper';
import { InvalidBackupTargetError, UnauthorizedActionError } from '@/shared/errors/domain.errors';
import { createChildLogger } from '@/shared/logger/pino';

const TARGET_OPTION = 'target';

export const BACKUP_USAGE = `${env.COMMAND_PREFIX}backup all | ${env.COMMAND_PREFIX}backup <channel id or mention>`;

export const parseBackupTarget = (raw: string | null | undefined): BackupTarget => {
  const parsed = BackupTargetSchema.safeParse(raw ?? undefined);
  if (!parsed.success) {
    throw new InvalidBackupTargetError(BACKUP_USAGE);
  }

  return parsed.data;
};

const hasAdminPermissions = (permissions: Readonly<PermissionsBitField> | null | undefined): boolean =>
  Boolean(permissions?.has(PERMISSIONS.admin));

export type GuildBackupRunner = Pick<CreateGuildBackupUseCase, 'execute'>;

const logger = createChildLogger({ module: 'backup' });

const createDefaultRunner = (): GuildBackupRunner => {
  const feedOptions = { pageTimeoutMs: env.BACKUP_PAGE_TIMEOUT_MS };

  return new CreateGuildBackupUseCase(
    {
      rosterCollector: new RosterCollector(logger, { ...feedOptions, pageSize: env.MEMBER_PAGE_SIZE }),
      historyArchiver: new HistoryArchiver(logger, feedOptions),
      archiveWriter: new ZipArchiveWriter(logger),
      storage: new LocalBackupStorage(env.BACKUP_DIRECTORY, logger),
    },
    logger,
  );
};

interface BackupRequest {
  readonly guild: Guild;
  readonly requesterId: string;
  readonly rawTarget: string | null | undefined;
  readonly reporter: BackupProgressReporter;
}

export const createBackupCommand = (runner: GuildBackupRunner = createDefaultRunner()): Command => {
  /** Validates the target before anything is posted, then runs the backup. */
  const runBackup = async ({ guild, requesterId, rawTarget, reporter }: BackupRequest): Promise<void> => {
    const target = parseBackupTarget(rawTarget);

    logger.info({ guildId: guild.id, requesterId, target }, 'Backup requested.');

    await runner.execute({ guild, target, reporter });
  };

  return {
    data: new SlashCommandBuilder()
      .setName('backup')
      .setDescription('Archives members and channel history into a local ZIP file.')
      .setDefaultMemberPermissions(PERMISSIONS.admin[0])
      .addStringOption((option) =>
        option
          .setName(TARGET_OPTION)
          .setDescription('"all" for every text channel, or a channel id / mention.')
          .setRequired(true),
      ),
    category: 'Administration',
    examples: ['/backup target:all', `${env.COMMAND_PREFIX}backup all`, `${env.COMMAND_PREFIX}backup #general`],
    prefix: {
      name: 'backup',
      async execute(message, args) {
        try {
          if (!hasAdminPermissions(message.member?.permissions)) {
            throw new UnauthorizedActionError('backup');
          }

          await runBackup({
            guild: message.guild,
            requesterId: message.author.id,
            rawTarget: args[0],
            reporter: new StatusMessageReporter((payload) =>
              message.reply({ embeds: payload.embeds, allowedMentions: { repliedUser: false } }),
            ),
          });
        } catch (error) {
          logger.error({ err: error, guildId: message.guildId }, 'Backup failed.');

          await message.reply({
            embeds: [mapErrorToDiscordResponse(error)],
            allowedMentions: { repliedUser: false },
          });
        }
      },
    },
    async execute(interaction) {
      try {
        if (!interaction.inCachedGuild()) {
          throw new UnauthorizedActionError('backup');
        }

        if (!hasAdminPermissions(interaction.memberPermissions)) {
          throw new UnauthorizedActionError('backup');
        }

        await runBackup({
          guild: interaction.guild,
          requesterId: interaction.user.id,
          rawTarget: interaction.options.getString(TARGET_OPTION),
          reporter: new StatusMessageReporter(async (payload) => {
            await interaction.reply({ embeds: payload.embeds });
            return interaction.fetchReply();
          }),
        });
      } catch (error) {
        logger.error({ err: error, guildId: interaction.guildId }, 'Backup failed.');

        const payload = { embeds: [mapErrorToDiscordResponse(error)], flags: MessageFlags.Ephemeral } as const;
        if (interaction.replied || interaction.deferred) {
          await interaction.followUp(payload);
        } else {
          await interaction.reply(payload);
        }
      }
    },
  };
};

export const backupCommand: Command = createBackupCommand();
