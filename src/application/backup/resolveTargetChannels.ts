// =============================================================================
// RUTA: src/application/backup/resolveTargetChannels.ts
// =============================================================================

import {
  ChannelType,
  type Guild,
  type GuildBasedChannel,
  type GuildTextBasedChannel,
  type NewsChannel,
  type TextChannel,
} from 'discord.js';

import type { BackupTarget } from '@/application/dto/backup.dto';
import { compareSnowflakes, extractSnowflake } from '@/shared/utils/discord.utils';

type ArchivableTextChannel = TextChannel | NewsChannel;

const isArchivableTextChannel = (channel: GuildBasedChannel): channel is ArchivableTextChannel =>
  channel.type === ChannelType.GuildText || channel.type === ChannelType.GuildAnnouncement;

const byPosition = (left: ArchivableTextChannel, right: ArchivableTextChannel): number =>
  left.position - right.position || compareSnowflakes(left.id, right.id);

/**
 * `all` yields every text and announcement channel in sidebar order; any other token is reduced
 * to its digits and looked up as a channel id. An empty result means "no target".
 */
export const resolveTargetChannels = (guild: Guild, target: BackupTarget): GuildTextBasedChannel[] => {
  if (target.kind === 'all') {
    return [...guild.channels.cache.values()].filter(isArchivableTextChannel).sort(byPosition);
  }

  const channelId = extractSnowflake(target.token);
  if (!channelId) {
    return [];
  }

  const channel = guild.channels.cache.get(channelId);
  if (!channel || !channel.isTextBased()) {
    return [];
  }

  return [channel];
};
