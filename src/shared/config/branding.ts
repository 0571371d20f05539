// ============================================================================
// RUTA: src/shared/config/branding.ts
// ============================================================================

interface ArchivistBrandConfig {
  readonly color: number;
  readonly author: {
    readonly name: string;
    readonly iconURL?: string;
  };
  readonly footer: {
    readonly text: string;
    readonly iconURL?: string;
  };
}

const brandIconEnv = process.env['ARCHIVIST_BRAND_ICON_URL']?.trim();
const brandIconURL = brandIconEnv && brandIconEnv.startsWith('http') ? brandIconEnv : undefined;

export const ARCHIVIST_BRAND: ArchivistBrandConfig = Object.freeze({
  color: 0x5865f2,
  author: {
    name: 'Guild Archivist',
    iconURL: brandIconURL,
  },
  footer: {
    text: 'Guild Archivist • Local backups',
    iconURL: brandIconURL,
  },
});
