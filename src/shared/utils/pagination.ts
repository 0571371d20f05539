// ============================================================================
// RUTA: src/shared/utils/pagination.ts
// ============================================================================

import { FeedTimeoutError } from '@/shared/errors/domain.errors';

export interface Page<TItem, TCursor> {
  readonly items: ReadonlyArray<TItem>;
  /** `null` once the source has nothing after this page. */
  readonly nextCursor: TCursor | null;
}

export type PageFetcher<TItem, TCursor> = (cursor: TCursor | undefined) => Promise<Page<TItem, TCursor>>;

export interface PagedFeedOptions {
  /** Name used in timeout errors and logs. */
  readonly label: string;
  /** `0` waits forever. */
  readonly pageTimeoutMs?: number;
}

const withPageTimeout = async <T>(promise: Promise<T>, label: string, timeoutMs: number): Promise<T> => {
  if (timeoutMs <= 0) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new FeedTimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
};

/**
 * Lazily walks a cursor-paginated source. Each `next()` on the iterator may
 * suspend on a page fetch; the sequence is finite but its length is unknown
 * up front and it cannot be resumed midway (iterate again to start over).
 */
export async function* paginate<TItem, TCursor>(
  fetchPage: PageFetcher<TItem, TCursor>,
  options: PagedFeedOptions,
): AsyncGenerator<TItem, void, undefined> {
  let cursor: TCursor | undefined;

  for (;;) {
    const page = await withPageTimeout(fetchPage(cursor), options.label, options.pageTimeoutMs ?? 0);

    yield* page.items;

    if (page.nextCursor === null) {
      return;
    }

    cursor = page.nextCursor;
  }
}
