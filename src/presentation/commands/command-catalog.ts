// ============================================================================
// RUTA: src/presentation/commands/command-catalog.ts
// ============================================================================

import type { RESTPostAPIApplicationCommandsJSONBody } from 'discord.js';

import type { Command, PrefixCommand } from '@/presentation/commands/types';

export interface CommandCatalog {
  readonly commands: ReadonlyArray<Command>;
  findSlash(name: string): Command | undefined;
  /** Prefix names are matched case-insensitively. */
  findPrefix(name: string): PrefixCommand | undefined;
  toRegistrationBody(): RESTPostAPIApplicationCommandsJSONBody[];
}

export const createCommandCatalog = (commands: ReadonlyArray<Command>): CommandCatalog => {
  const bySlashName = new Map<string, Command>();
  const byPrefixName = new Map<string, PrefixCommand>();

  for (const command of commands) {
    const slashName = command.data.name;
    if (bySlashName.has(slashName)) {
      throw new Error(`Slash command /${slashName} is declared twice.`);
    }
    bySlashName.set(slashName, command);

    if (command.prefix) {
      const prefixName = command.prefix.name.toLowerCase();
      if (byPrefixName.has(prefixName)) {
        throw new Error(`Prefix command ${prefixName} is declared twice.`);
      }
      byPrefixName.set(prefixName, command.prefix);
    }
  }

  const listed = [...commands];

  return {
    commands: listed,
    findSlash: (name) => bySlashName.get(name),
    findPrefix: (name) => byPrefixName.get(name.toLowerCase()),
    toRegistrationBody: () => listed.map((command) => command.data.toJSON()),
  };
};
