// =============================================================================
// RUTA: src/application/services/HistoryArchiver.ts
// =============================================================================

import type { GuildTextBasedChannel, Message } from 'discord.js';
import type { Logger } from 'pino';

import { toMessageRecord } from '@/application/backup/records';
import type { MessageRecord } from '@/domain/entities/Snapshot';
import { DISCORD_PAGE_LIMITS } from '@/shared/config/constants';
import { isAccessDeniedError } from '@/shared/errors/discord-error-mapper';
import { ChannelAccessDeniedError } from '@/shared/errors/domain.errors';
import { compareSnowflakes } from '@/shared/utils/discord.utils';
import { paginate } from '@/shared/utils/pagination';

/** Snowflake lower than any message id: `after` it means "from the very first message". */
const CHANNEL_START = '0';

export interface HistoryArchiverOptions {
  readonly pageTimeoutMs?: number;
}

export class HistoryArchiver {
  public constructor(
    private readonly logger: Logger,
    private readonly options: HistoryArchiverOptions = {},
  ) {}

  /**
   * Drains the channel history oldest to newest, with no cap.
   *
   * @throws ChannelAccessDeniedError when the bot cannot read the channel.
   */
  public async archive(channel: GuildTextBasedChannel): Promise<MessageRecord[]> {
    const limit = DISCORD_PAGE_LIMITS.messages;
    const history: MessageRecord[] = [];

    const feed = paginate<Message, string>(
      async (after) => {
        const page = await channel.messages.fetch({ limit, after: after ?? CHANNEL_START, cache: false });
        const items = [...page.values()].sort((left, right) => compareSnowflakes(left.id, right.id));
        const last = items.at(-1);

        return {
          items,
          nextCursor: items.length === limit && last ? last.id : null,
        };
      },
      { label: `#${channel.name}`, pageTimeoutMs: this.options.pageTimeoutMs },
    );

    try {
      for await (const message of feed) {
        history.push(toMessageRecord(message));
      }
    } catch (error) {
      if (isAccessDeniedError(error)) {
        throw new ChannelAccessDeniedError(channel.id, channel.name, error);
      }

      throw error;
    }

    this.logger.debug({ channelId: channel.id, messages: history.length }, 'Channel history archived.');

    return history;
  }
}
