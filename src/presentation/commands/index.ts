// ============================================================================
// RUTA: src/presentation/commands/index.ts
// ============================================================================

import { backupCommand } from '@/presentation/commands/backup/backup';
import { createCommandCatalog } from '@/presentation/commands/command-catalog';
import { createHelpCommand } from '@/presentation/commands/general/help';

const helpCommand = createHelpCommand(() => commandCatalog.commands);

export const commandCatalog = createCommandCatalog([helpCommand, backupCommand]);
