// =============================================================================
// RUTA: src/application/backup/fieldRules.ts
// =============================================================================

import {
  type Guild,
  GuildDefaultMessageNotifications,
  GuildExplicitContentFilter,
  GuildMFALevel,
  GuildNSFWLevel,
  GuildPremiumTier,
  GuildVerificationLevel,
} from 'discord.js';

import type { JsonObject } from '@/domain/entities/Snapshot';
import { toJsonValue } from '@/domain/value-objects/ArchivableValue';

export interface FieldRule<TSource> {
  readonly name: string;
  readonly read: (source: TSource) => unknown;
}

export interface FieldExtraction {
  readonly values: JsonObject;
  readonly skipped: ReadonlyArray<{ readonly field: string; readonly error: unknown }>;
}

/** Bumped whenever a field is added, removed or changes meaning. */
export const GUILD_INFO_SCHEMA_VERSION = 1;

/**
 * Scalar guild attributes archived under `info`. Relations (members, channels,
 * roles, emojis, stickers) are collected by their own collectors or not at all.
 */
export const GUILD_INFO_FIELDS: ReadonlyArray<FieldRule<Guild>> = [
  { name: 'id', read: (guild) => guild.id },
  { name: 'name', read: (guild) => guild.name },
  { name: 'description', read: (guild) => guild.description },
  { name: 'icon', read: (guild) => guild.iconURL() },
  { name: 'banner', read: (guild) => guild.bannerURL() },
  { name: 'splash', read: (guild) => guild.splashURL() },
  { name: 'discovery_splash', read: (guild) => guild.discoverySplashURL() },
  { name: 'owner_id', read: (guild) => guild.ownerId },
  { name: 'member_count', read: (guild) => guild.memberCount },
  { name: 'max_members', read: (guild) => guild.maximumMembers },
  { name: 'created_at', read: (guild) => guild.createdAt },
  { name: 'joined_at', read: (guild) => guild.joinedAt },
  { name: 'preferred_locale', read: (guild) => guild.preferredLocale },
  { name: 'premium_tier', read: (guild) => GuildPremiumTier[guild.premiumTier] },
  { name: 'premium_subscription_count', read: (guild) => guild.premiumSubscriptionCount },
  { name: 'verification_level', read: (guild) => GuildVerificationLevel[guild.verificationLevel] },
  { name: 'explicit_content_filter', read: (guild) => GuildExplicitContentFilter[guild.explicitContentFilter] },
  { name: 'mfa_level', read: (guild) => GuildMFALevel[guild.mfaLevel] },
  { name: 'nsfw_level', read: (guild) => GuildNSFWLevel[guild.nsfwLevel] },
  {
    name: 'default_notifications',
    read: (guild) => GuildDefaultMessageNotifications[guild.defaultMessageNotifications],
  },
  { name: 'vanity_url_code', read: (guild) => guild.vanityURLCode },
  { name: 'afk_timeout', read: (guild) => guild.afkTimeout },
  { name: 'afk_channel_id', read: (guild) => guild.afkChannelId },
  { name: 'system_channel_id', read: (guild) => guild.systemChannelId },
  { name: 'rules_channel_id', read: (guild) => guild.rulesChannelId },
  { name: 'public_updates_channel_id', read: (guild) => guild.publicUpdatesChannelId },
  { name: 'features', read: (guild) => guild.features },
  { name: 'large', read: (guild) => guild.large },
  { name: 'available', read: (guild) => guild.available },
  { name: 'partnered', read: (guild) => guild.partnered },
  { name: 'verified', read: (guild) => guild.verified },
  { name: 'shard_id', read: (guild) => guild.shardId },
];

export const extractFields = <TSource>(
  source: TSource,
  rules: ReadonlyArray<FieldRule<TSource>>,
): FieldExtraction => {
  const values: JsonObject = {};
  const skipped: Array<{ field: string; error: unknown }> = [];

  for (const rule of rules) {
    let raw: unknown;
    try {
      raw = rule.read(source);
    } catch (error) {
      skipped.push({ field: rule.name, error });
      continue;
    }

    const value = toJsonValue(raw);
    if (value !== undefined) {
      values[rule.name] = value;
    }
  }

  return { values, skipped };
};
