// =============================================================================
// RUTA: src/application/usecases/backup/CreateGuildBackupUseCase.ts
// =============================================================================

import type { Guild, GuildTextBasedChannel } from 'discord.js';
import type { Logger } from 'pino';

import { extractFields, GUILD_INFO_FIELDS, GUILD_INFO_SCHEMA_VERSION } from '@/application/backup/fieldRules';
import { resolveTargetChannels } from '@/application/backup/resolveTargetChannels';
import type { BackupTarget } from '@/application/dto/backup.dto';
import {
  BackupProgressTracker,
  type ProgressState,
  type ProgressView,
} from '@/application/services/BackupProgressTracker';
import type { HistoryArchiver } from '@/application/services/HistoryArchiver';
import type { RosterCollector } from '@/application/services/RosterCollector';
import { createEmptySnapshot, type Snapshot } from '@/domain/entities/Snapshot';
import type { IBackupStorage } from '@/domain/repositories/IBackupStorage';
import type { IArchiveWriter } from '@/domain/services/IArchiveWriter';
import { buildBackupFileName } from '@/domain/value-objects/BackupFileName';
import { ChannelAccessDeniedError, ChannelNotFoundError } from '@/shared/errors/domain.errors';

export enum BackupPhase {
  INIT = 'INIT',
  COLLECTING_INFO = 'COLLECTING_INFO',
  COLLECTING_ROSTER = 'COLLECTING_ROSTER',
  ITERATING_CHANNELS = 'ITERATING_CHANNELS',
  FINALIZED = 'FINALIZED',
}

const PHASE_ORDER: readonly BackupPhase[] = [
  BackupPhase.INIT,
  BackupPhase.COLLECTING_INFO,
  BackupPhase.COLLECTING_ROSTER,
  BackupPhase.ITERATING_CHANNELS,
  BackupPhase.FINALIZED,
];

export const BACKUP_DONE_STATUS = 'done';

/** Renders progress somewhere the requester can see it (usually one embed edited in place). */
export interface BackupProgressReporter {
  start(view: ProgressView): Promise<void>;
  update(view: ProgressView): Promise<void>;
  complete(view: ProgressView, archivePath: string): Promise<void>;
}

export interface CreateGuildBackupParams {
  readonly guild: Guild;
  readonly target: BackupTarget;
  readonly reporter: BackupProgressReporter;
}

export interface SkippedChannel {
  readonly id: string;
  readonly name: string;
}

export interface CreateGuildBackupResult {
  readonly snapshot: Snapshot;
  readonly fileName: string;
  readonly archivePath: string;
  readonly progress: ProgressState;
  readonly skippedChannels: readonly SkippedChannel[];
}

export interface CreateGuildBackupDependencies {
  readonly rosterCollector: Pick<RosterCollector, 'collect'>;
  readonly historyArchiver: Pick<HistoryArchiver, 'archive'>;
  readonly archiveWriter: IArchiveWriter;
  readonly storage: IBackupStorage;
  readonly clock?: () => Date;
}

export class CreateGuildBackupUseCase {
  private readonly clock: () => Date;

  public constructor(
    private readonly dependencies: CreateGuildBackupDependencies,
    private readonly logger: Logger,
  ) {
    this.clock = dependencies.clock ?? (() => new Date());
  }

  public async execute({ guild, target, reporter }: CreateGuildBackupParams): Promise<CreateGuildBackupResult> {
    const log = this.logger.child({ guildId: guild.id });
    let phase = BackupPhase.INIT;

    const enter = (next: BackupPhase): void => {
      if (PHASE_ORDER.indexOf(next) !== PHASE_ORDER.indexOf(phase) + 1) {
        throw new Error(`Backup cannot move from ${phase} to ${next}.`);
      }

      phase = next;
      log.debug({ phase }, 'Backup phase changed.');
    };

    const channels = resolveTargetChannels(guild, target);
    if (channels.length === 0) {
      throw new ChannelNotFoundError(target.kind === 'all' ? 'all' : target.token);
    }

    const tracker = new BackupProgressTracker();
    await reporter.start(tracker.view());

    const snapshot = createEmptySnapshot();

    enter(BackupPhase.COLLECTING_INFO);
    const { values, skipped } = extractFields(guild, GUILD_INFO_FIELDS);
    for (const { field, error } of skipped) {
      log.debug({ field, err: error }, 'Guild attribute could not be read; leaving it out.');
    }
    snapshot.info = values;

    enter(BackupPhase.COLLECTING_ROSTER);
    snapshot.members = await this.dependencies.rosterCollector.collect(guild);

    enter(BackupPhase.ITERATING_CHANNELS);
    const total = channels.length;
    const skippedChannels: SkippedChannel[] = [];
    let archivedMessages = 0;

    for (const [index, channel] of channels.entries()) {
      await reporter.update(tracker.advance(index, total, archivedMessages, `archiving #${channel.name}`));

      try {
        const history = await this.dependencies.historyArchiver.archive(channel);
        snapshot.channels[this.resolveChannelKey(snapshot, channel, log)] = history;
        archivedMessages += history.length;

        await reporter.update(tracker.advance(index + 1, total, archivedMessages, `archived #${channel.name}`));
      } catch (error) {
        if (!(error instanceof ChannelAccessDeniedError)) {
          throw error;
        }

        log.warn({ channelId: channel.id, channelName: channel.name }, 'Access denied to channel; skipping it.');
        skippedChannels.push({ id: channel.id, name: channel.name });

        await reporter.update(
          tracker.advance(index + 1, total, archivedMessages, `skipped #${channel.name} (access denied)`),
        );
      }
    }

    enter(BackupPhase.FINALIZED);
    const fileName = buildBackupFileName(guild.name, this.clock());
    const archive = await this.dependencies.archiveWriter.write(snapshot, fileName);
    const archivePath = await this.dependencies.storage.save(archive, fileName);

    const finalView = tracker.advance(total, total, archivedMessages, BACKUP_DONE_STATUS);
    await reporter.complete(finalView, archivePath);

    log.info(
      {
        archivePath,
        channels: Object.keys(snapshot.channels).length,
        skippedChannels: skippedChannels.length,
        members: Object.keys(snapshot.members).length,
        messages: archivedMessages,
        infoSchemaVersion: GUILD_INFO_SCHEMA_VERSION,
      },
      'Backup completed.',
    );

    return {
      snapshot,
      fileName,
      archivePath,
      progress: tracker.current,
      skippedChannels,
    };
  }

  /** First free key among `name`, `name-id`, `name-id-2`, `name-id-3`, ... */
  private resolveChannelKey(snapshot: Snapshot, channel: GuildTextBasedChannel, log: Logger): string {
    if (!Object.hasOwn(snapshot.channels, channel.name)) {
      return channel.name;
    }

    const base = `${channel.name}-${channel.id}`;
    let key = base;
    for (let attempt = 2; Object.hasOwn(snapshot.channels, key); attempt += 1) {
      key = `${base}-${attempt}`;
    }

    log.warn({ channelId: channel.id, channelName: channel.name, key }, 'Duplicate channel name; archiving under a suffixed key.');

    return key;
  }
}
