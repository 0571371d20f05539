// ============================================================================
// RUTA: src/presentation/backup/StatusMessageReporter.ts
// ============================================================================

import type { EmbedBuilder } from 'discord.js';

import type { ProgressView } from '@/application/services/BackupProgressTracker';
import type { BackupProgressReporter } from '@/application/usecases/backup/CreateGuildBackupUseCase';
import { type EmbedFactory, embedFactory } from '@/presentation/embeds/EmbedFactory';

export interface StatusPayload {
  readonly embeds: EmbedBuilder[];
}

export interface EditableStatusMessage {
  edit(payload: StatusPayload): Promise<unknown>;
}

export type StatusMessageSender = (payload: StatusPayload) => Promise<EditableStatusMessage>;

/** Posts one status embed when the backup starts and keeps editing that same message. */
export class StatusMessageReporter implements BackupProgressReporter {
  private message: EditableStatusMessage | null = null;

  public constructor(
    private readonly send: StatusMessageSender,
    private readonly embeds: EmbedFactory = embedFactory,
  ) {}

  public async start(view: ProgressView): Promise<void> {
    this.message = await this.send({ embeds: [this.embeds.backupProgress({ view })] });
  }

  public async update(view: ProgressView): Promise<void> {
    await this.requireMessage().edit({ embeds: [this.embeds.backupProgress({ view })] });
  }

  public async complete(view: ProgressView, archivePath: string): Promise<void> {
    await this.requireMessage().edit({ embeds: [this.embeds.backupProgress({ view, archivePath })] });
  }

  private requireMessage(): EditableStatusMessage {
    if (!this.message) {
      throw new Error('The backup status message has not been sent yet.');
    }

    return this.message;
  }
}
