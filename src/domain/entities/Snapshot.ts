// =============================================================================
// RUTA: src/domain/entities/Snapshot.ts
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface MemberRecord {
  readonly name: string;
  readonly display_name: string;
  readonly roles: string[];
  /** ISO-8601, or `"None"` when Discord does not know the join date. */
  readonly joined_at: string;
  readonly bot: boolean;
}

export interface MessageAuthorRecord {
  readonly name: string;
  readonly id: string;
  readonly bot: boolean;
}

export interface ReactionRecord {
  readonly emoji: string;
  readonly count: number;
}

export interface MessageRecord {
  readonly id: string;
  readonly content: string;
  readonly author: MessageAuthorRecord;
  readonly created_at: string;
  readonly attachments: string[];
  readonly embeds: JsonObject[];
  readonly reactions: ReactionRecord[];
  readonly pinned: boolean;
  readonly type: string;
}

export type MemberMap = Record<string, MemberRecord>;

export type ChannelHistoryMap = Record<string, MessageRecord[]>;

export interface Snapshot {
  info: JsonObject;
  members: MemberMap;
  channels: ChannelHistoryMap;
}

export const createEmptySnapshot = (): Snapshot => ({
  info: {},
  members: {},
  channels: {},
});
