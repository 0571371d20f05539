// ============================================================================
// RUTA: src/shared/utils/branding.ts
// ============================================================================

import type { EmbedBuilder } from 'discord.js';

import { ARCHIVIST_BRAND } from '@/shared/config/branding';

export interface BrandDecorations {
  readonly color?: number;
  readonly timestamp?: Date;
}

export const applyArchivistBrand = <T extends EmbedBuilder>(
  embed: T,
  decorations: BrandDecorations = {},
): T => {
  const desiredColor = decorations.color ?? ARCHIVIST_BRAND.color;
  if (!embed.data.color || decorations.color !== undefined) {
    embed.setColor(desiredColor);
  }

  if (!embed.data.author) {
    embed.setAuthor(ARCHIVIST_BRAND.author);
  }

  if (!embed.data.footer) {
    embed.setFooter({
      text: ARCHIVIST_BRAND.footer.text,
      iconURL: ARCHIVIST_BRAND.footer.iconURL,
    });
  }

  if (!embed.data.timestamp) {
    embed.setTimestamp(decorations.timestamp ?? new Date());
  }

  return embed;
};
