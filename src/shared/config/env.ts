// ============================================================================
// RUTA: src/shared/config/env.ts
// ============================================================================

import { z } from 'zod';

const emptyToUndefined = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => {
    if (value === undefined || value === null) {
      return undefined;
    }

    if (typeof value === 'string' && value.trim().length === 0) {
      return undefined;
    }

    return value;
  }, schema.optional());

const snowflakePattern = /^\d{17,20}$/u;

export const EnvSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, 'DISCORD_TOKEN is required'),
  DISCORD_CLIENT_ID: z.string().regex(snowflakePattern, 'DISCORD_CLIENT_ID must be a Discord snowflake'),
  DISCORD_GUILD_ID: emptyToUndefined(
    z.string().regex(snowflakePattern, 'DISCORD_GUILD_ID must be a Discord snowflake'),
  ),
  COMMAND_PREFIX: z
    .string()
    .min(1, 'COMMAND_PREFIX is required')
    .max(5, 'COMMAND_PREFIX must be at most 5 characters')
    .optional()
    .default('!'),
  BACKUP_DIRECTORY: z.string().trim().min(1).default('backups'),
  BACKUP_PAGE_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),
  MEMBER_PAGE_SIZE: z.coerce.number().int().min(1).max(1_000).default(1_000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FILE: emptyToUndefined(z.string()),
});

export type Env = z.infer<typeof EnvSchema>;

export const env: Env = EnvSchema.parse(process.env);
