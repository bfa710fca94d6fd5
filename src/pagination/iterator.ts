import type { ResponseEnvelope } from '../types/envelope.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';

/** Page position requested for one call. */
export interface PageQuery {
  /** Absent on the first call unless the caller started from a given page. */
  pageNumber?: number;
  pageSize?: number;
}

/** Options for a {@link PageIterator}. */
export interface PageIteratorOptions<Data, Item> {
  /** Fetches one page, normally a dispatcher-backed call. */
  fetchPage: (page: PageQuery) => SafeWrapAsync<Error, ResponseEnvelope<Data>>;
  /** Picks the batch of items out of a page's data. */
  selectItems: (data: Data) => readonly Item[] | null | undefined;
  /** Page to start from; omitted means the server's first page. */
  pageNumber?: number;
  pageSize?: number;
}

interface Cursor {
  pageNumber?: number;
  pageSize?: number;
  finished: boolean;
}

/**
 * Lazy, finite walk over a paged endpoint, one batch per {@link PageIterator.next} call.
 *
 * The cursor is owned by the instance and only moves inside `next()`. Overlapping `next()` calls run one
 * after another, so each gets its own page. An error ends the walk;
 * start over with a fresh iterator, passing `pageNumber` to resume from a known page.
 *
 * @example
 * const pages = client.paginate('/v1/{chainName}/address/{address}/transactions_v2/', { ... });
 * for await (const [err, batch] of pages) {
 *   if (err) throw err;
 *   handle(batch);
 * }
 */
export class PageIterator<Data, Item> {
  #fetchPage: (page: PageQuery) => SafeWrapAsync<Error, ResponseEnvelope<Data>>;
  #selectItems: (data: Data) => readonly Item[] | null | undefined;
  #cursor: Cursor;
  /** Tail of the queue of `next()` calls; each waits for the one before it. */
  #queue: Promise<unknown> = Promise.resolve();

  constructor({ fetchPage, selectItems, pageNumber, pageSize }: PageIteratorOptions<Data, Item>) {
    this.#fetchPage = fetchPage;
    this.#selectItems = selectItems;
    this.#cursor = { pageNumber, pageSize, finished: false };
  }

  /**
   * Whether another call to `next()` may still produce a batch.
   */
  hasMore(): boolean {
    return !this.#cursor.finished;
  }

  /**
   * Fetches the next batch.
   *
   * @returns `[null, items]` for a non-empty batch, `[null, null]` once the walk is over,
   *          or `[error, null]` after which the iterator stays finished.
   */
  next(): SafeWrapAsync<Error, Item[] | null> {
    const run = this.#queue.then(() => this.#advance());
    this.#queue = run;
    return run;
  }

  async #advance(): SafeWrapAsync<Error, Item[] | null> {
    if (this.#cursor.finished) {
      return [null, null];
    }

    const { pageNumber, pageSize } = this.#cursor;
    const [errThrown, page] = await safeWrapAsync(() =>
      this.#fetchPage({
        ...(pageNumber !== undefined && { pageNumber }),
        ...(pageSize !== undefined && { pageSize }),
      }),
    );
    if (errThrown) {
      this.#cursor.finished = true;
      return [errThrown, null];
    }

    const [err, envelope] = page;
    if (err) {
      this.#cursor.finished = true;
      return [err, null];
    }

    const { data } = envelope;
    const [errSelect, items] = safeWrap<Error, readonly Item[] | null | undefined>(() =>
      data === undefined ? undefined : this.#selectItems(data),
    );
    if (errSelect) {
      this.#cursor.finished = true;
      return [errSelect, null];
    }

    if (!items || items.length === 0) {
      this.#cursor.finished = true;
      return [null, null];
    }

    // A missing has_more ends the walk.
    if (envelope.pagination?.hasMore === true) {
      this.#cursor.pageNumber = (envelope.pagination.pageNumber ?? pageNumber ?? 0) + 1;
    } else {
      this.#cursor.finished = true;
    }

    return [null, [...items]];
  }

  /**
   * Drains the remaining pages into one array, stopping at the first error.
   */
  async collect(): SafeWrapAsync<Error, Item[]> {
    const all: Item[] = [];
    while (true) {
      const [err, batch] = await this.next();
      if (err) {
        return [err, null];
      }

      if (!batch) {
        return [null, all];
      }

      all.push(...batch);
    }
  }

  /**
   * Yields each batch as `[null, items]`; an error is yielded once as `[error, null]` and ends iteration.
   */
  async *[Symbol.asyncIterator](): AsyncGenerator<SafeWrap<Error, Item[]>, void, undefined> {
    while (true) {
      const [err, batch] = await this.next();
      if (err) {
        yield [err, null];
        return;
      }

      if (!batch) {
        return;
      }

      yield [null, batch];
    }
  }
}
