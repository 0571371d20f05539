// =============================================================================
// RUTA: src/application/services/RosterCollector.ts
// =============================================================================

import type { Guild, GuildMember } from 'discord.js';
import type { Logger } from 'pino';

import { toMemberRecord } from '@/application/backup/records';
import type { MemberMap } from '@/domain/entities/Snapshot';
import { DISCORD_PAGE_LIMITS } from '@/shared/config/constants';
import { compareSnowflakes } from '@/shared/utils/discord.utils';
import { paginate } from '@/shared/utils/pagination';

export interface RosterCollectorOptions {
  readonly pageSize?: number;
  readonly pageTimeoutMs?: number;
}

export class RosterCollector {
  private readonly pageSize: number;

  public constructor(
    private readonly logger: Logger,
    private readonly options: RosterCollectorOptions = {},
  ) {
    this.pageSize = Math.min(options.pageSize ?? DISCORD_PAGE_LIMITS.members, DISCORD_PAGE_LIMITS.members);
  }

  /** Reads the whole member list. Any failure is left to the caller: a roster is mandatory. */
  public async collect(guild: Guild): Promise<MemberMap> {
    const members: MemberMap = {};

    const feed = paginate<GuildMember, string>(
      async (after) => {
        const page = await guild.members.list({ limit: this.pageSize, after, cache: false });
        const items = [...page.values()];
        const lastId = items.map((member) => member.id).sort(compareSnowflakes).at(-1);

        return {
          items,
          nextCursor: items.length === this.pageSize && lastId ? lastId : null,
        };
      },
      { label: `members of ${guild.name}`, pageTimeoutMs: this.options.pageTimeoutMs },
    );

    for await (const member of feed) {
      members[member.id] = toMemberRecord(member);
    }

    this.logger.debug({ guildId: guild.id, members: Object.keys(members).length }, 'Roster collected.');

    return members;
  }
}
