// ============================================================================
// RUTA: src/shared/errors/base.error.ts
// ============================================================================

export interface ArchivistErrorOptions {
  readonly code: string;
  readonly message: string;
  readonly cause?: unknown;
  readonly metadata?: Record<string, unknown>;
  readonly exposeMessage?: boolean;
}

export class ArchivistError extends Error {
  public readonly code: string;

  public readonly metadata: Record<string, unknown>;

  public readonly exposeMessage: boolean;

  public constructor(options: ArchivistErrorOptions) {
    super(options.message);
    this.name = 'ArchivistError';
    this.code = options.code;
    this.metadata = options.metadata ?? {};
    this.exposeMessage = options.exposeMessage ?? false;

    if (options.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace?.(this, ArchivistError);
  }
}

export const isArchivistError = (value: unknown): value is ArchivistError => value instanceof ArchivistError;
