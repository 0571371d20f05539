// ============================================================================
// RUTA: src/shared/errors/domain.errors.ts
// ============================================================================

import { ArchivistError } from '@/shared/errors/base.error';

export class InvalidBackupTargetError extends ArchivistError {
  public constructor(usage: string) {
    super({
      code: 'INVALID_BACKUP_TARGET',
      message: `Usage: \`${usage}\``,
      metadata: { usage },
      exposeMessage: true,
    });
  }
}

export class ChannelNotFoundError extends ArchivistError {
  public constructor(target: string) {
    super({
      code: 'CHANNEL_NOT_FOUND',
      message: 'Channel not found.',
      metadata: { target },
      exposeMessage: true,
    });
  }
}

export class ChannelAccessDeniedError extends ArchivistError {
  public constructor(channelId: string, channelName: string, cause?: unknown) {
    super({
      code: 'CHANNEL_ACCESS_DENIED',
      message: `Access denied to #${channelName}.`,
      metadata: { channelId, channelName },
      exposeMessage: true,
      cause,
    });
  }
}

export class UnauthorizedActionError extends ArchivistError {
  public constructor(action: string) {
    super({
      code: 'UNAUTHORIZED_ACTION',
      message: 'You need the Administrator permission to do this.',
      metadata: { action },
      exposeMessage: true,
    });
  }
}

export class FeedTimeoutError extends ArchivistError {
  public constructor(feed: string, timeoutMs: number) {
    super({
      code: 'FEED_TIMEOUT',
      message: `Discord did not answer within ${timeoutMs} ms while reading ${feed}.`,
      metadata: { feed, timeoutMs },
      exposeMessage: true,
    });
  }
}

export class ArchiveEncodingError extends ArchivistError {
  public constructor(key: string, cause?: unknown) {
    super({
      code: 'ARCHIVE_ENCODING_FAILED',
      message: 'The backup could not be encoded.',
      metadata: { key },
      exposeMessage: false,
      cause,
    });
  }
}

export class InvalidProgressStateError extends ArchivistError {
  public constructor(details: Record<string, unknown>) {
    super({
      code: 'INVALID_PROGRESS_STATE',
      message: 'Backup progress moved backwards or past its total.',
      metadata: details,
      exposeMessage: false,
    });
  }
}
