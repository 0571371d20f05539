// ============================================================================
// RUTA: src/presentation/commands/types.ts
// ============================================================================

import type {
  ChatInputCommandInteraction,
  Message,
  SlashCommandBuilder,
  SlashCommandOptionsOnlyBuilder,
  SlashCommandSubcommandsOnlyBuilder,
} from 'discord.js';

type SlashBuilder =
  | SlashCommandBuilder
  | SlashCommandOptionsOnlyBuilder
  | SlashCommandSubcommandsOnlyBuilder;

type CommandCategory = 'General' | 'Administration';

export interface CommandMeta {
  readonly category?: CommandCategory;
  readonly examples?: ReadonlyArray<string>;
}

export interface PrefixCommand {
  readonly name: string;
  readonly execute: (message: Message<true>, args: ReadonlyArray<string>) => Promise<void>;
}

export interface Command extends CommandMeta {
  readonly data: SlashBuilder;
  readonly execute: (interaction: ChatInputCommandInteraction) => Promise<void>;
  readonly prefix?: PrefixCommand;
}
