// ============================================================================
// RUTA: src/presentation/embeds/EmbedFactory.ts
// ============================================================================

import { type APIEmbedField, EmbedBuilder } from 'discord.js';

import type { ProgressView } from '@/application/services/BackupProgressTracker';
import { COLORS, EMBED_LIMITS } from '@/shared/config/constants';
import { applyArchivistBrand } from '@/shared/utils/branding';
import { clampEmbedField, truncateText } from '@/shared/utils/discord.utils';

interface BaseEmbed {
  readonly title?: string;
  readonly description?: string;
  readonly fields?: ReadonlyArray<APIEmbedField>;
  readonly footer?: string;
  readonly timestamp?: Date;
}

interface BackupProgressData {
  readonly view: ProgressView;
  readonly archivePath?: string;
}

export const BACKUP_PATH_FIELD = 'Local path';

export class EmbedFactory {
  public error(payload: BaseEmbed): EmbedBuilder {
    return this.base({
      color: COLORS.danger,
      title: payload.title ?? 'Something went wrong',
      description: payload.description,
      fields: payload.fields,
      footer: payload.footer,
      timestamp: payload.timestamp ?? new Date(),
    });
  }

  public info(payload: BaseEmbed): EmbedBuilder {
    return this.base({
      color: COLORS.info,
      title: payload.title ?? 'Information',
      description: payload.description,
      fields: payload.fields,
      footer: payload.footer,
      timestamp: payload.timestamp ?? new Date(),
    });
  }

  public warning(payload: BaseEmbed): EmbedBuilder {
    return this.base({
      color: COLORS.warning,
      title: payload.title ?? 'Heads up',
      description: payload.description,
      fields: payload.fields,
      footer: payload.footer,
      timestamp: payload.timestamp ?? new Date(),
    });
  }

  /** Status embed of a running backup; with `archivePath` it becomes the final, green version. */
  public backupProgress(data: BackupProgressData): EmbedBuilder {
    const finished = data.archivePath !== undefined;
    const fields: APIEmbedField[] = data.view.fields.map((field) => ({ name: field.name, value: field.value }));

    if (data.archivePath !== undefined) {
      fields.push({ name: BACKUP_PATH_FIELD, value: `\`${data.archivePath}\`` });
    }

    return this.base({
      color: finished ? COLORS.success : COLORS.primary,
      title: finished ? 'Backup finished' : 'Backup started',
      fields,
    });
  }

  private base(options: {
    readonly color: number;
    readonly title: string;
    readonly description?: string;
    readonly fields?: ReadonlyArray<APIEmbedField>;
    readonly footer?: string;
    readonly timestamp?: Date;
  }): EmbedBuilder {
    const embed = new EmbedBuilder().setTitle(truncateText(options.title, EMBED_LIMITS.title));

    if (options.description) {
      embed.setDescription(truncateText(options.description, EMBED_LIMITS.description));
    }

    if (options.fields) {
      const sanitized = options.fields.slice(0, EMBED_LIMITS.maxFields).map((field) => ({
        name: truncateText(field.name, EMBED_LIMITS.fieldName),
        value: clampEmbedField(field.value),
        inline: field.inline ?? false,
      }));

      embed.addFields(sanitized);
    }

    if (options.footer) {
      embed.setFooter({ text: truncateText(options.footer, EMBED_LIMITS.footerText) });
    }

    return applyArchivistBrand(embed, {
      color: options.color,
      timestamp: options.timestamp,
    });
  }
}

export const embedFactory = new EmbedFactory();
