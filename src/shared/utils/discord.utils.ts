// ============================================================================
// RUTA: src/shared/utils/discord.utils.ts
// ============================================================================

import { EMBED_LIMITS } from '@/shared/config/constants';

const ELLIPSIS = '…';

export const truncateText = (value: string, limit: number): string => {
  if (value.length <= limit) {
    return value;
  }

  return `${value.slice(0, Math.max(0, limit - ELLIPSIS.length))}${ELLIPSIS}`;
};

export const clampEmbedField = (value: string): string => {
  const trimmed = value.trim();
  return truncateText(trimmed.length > 0 ? trimmed : '—', EMBED_LIMITS.fieldValue);
};

/**
 * Pulls the numeric id out of an arbitrary token (`<#123>`, `123`, `general-123`).
 * Returns `null` when the token has no digits at all.
 */
export const extractSnowflake = (token: string): string | null => {
  const digits = token.replace(/\D/gu, '');
  return digits.length > 0 ? digits : null;
};

export const compareSnowflakes = (left: string, right: string): number => {
  const a = BigInt(left);
  const b = BigInt(right);

  if (a === b) {
    return 0;
  }

  return a < b ? -1 : 1;
};
