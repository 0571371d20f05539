// =============================================================================
// RUTA: src/application/backup/records.ts
// =============================================================================

import { type GuildMember, type Message, MessageType } from 'discord.js';

import type { JsonObject, MemberRecord, MessageRecord } from '@/domain/entities/Snapshot';
import { isPlainRecord, normalizeRecord } from '@/domain/value-objects/ArchivableValue';

const UNKNOWN_JOIN_DATE = 'None';

const toJsonObject = (value: unknown): JsonObject => (isPlainRecord(value) ? normalizeRecord(value) : {});

export const toMemberRecord = (member: GuildMember): MemberRecord => ({
  name: member.user.username,
  display_name: member.displayName,
  roles: [...member.roles.cache.values()]
    .sort((left, right) => left.position - right.position)
    .map((role) => role.name),
  joined_at: member.joinedAt?.toISOString() ?? UNKNOWN_JOIN_DATE,
  bot: member.user.bot,
});

/** Copies everything out of the live message so nothing keeps a reference to the client cache. */
export const toMessageRecord = (message: Message): MessageRecord => ({
  id: message.id,
  content: message.content,
  author: {
    name: message.author.username,
    id: message.author.id,
    bot: message.author.bot,
  },
  created_at: message.createdAt.toISOString(),
  attachments: message.attachments.map((attachment) => attachment.url),
  embeds: message.embeds.map((embed) => toJsonObject(embed.toJSON())),
  reactions: message.reactions.cache.map((reaction) => ({
    emoji: reaction.emoji.toString(),
    count: reaction.count,
  })),
  pinned: message.pinned,
  type: MessageType[message.type],
});
