/**
 * CursorStream
 *
 * Turns a "fetch next page" capability into a lazy, forward-only sequence
 * of items. Each stream owns its cursor; it is not restartable and pulls
 * must not overlap.
 *
 * Termination rules:
 * - an `exhausted` cursor ends the sequence without another fetch;
 * - a malformed page (missing result set, or a cursor sent back to
 *   `not-started`) rejects one pull with InvalidResponseError;
 * - a rejected fetch rejects one pull with the fetch error.
 * After a rejected pull the cursor is forced to `exhausted`, so a parse
 * failure cannot turn into an endless refetch loop.
 *
 * @example
 * ```typescript
 * const stream = paginate<Row>((cursor) => transport.fetchPage(jobId, cursor));
 * for await (const row of stream) {
 *   handle(row);
 * }
 * ```
 */

import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { InvalidResponseError } from '../../shared/errors/index.js';
import {
  Cursors,
  type Cursor,
  type PageFetcher,
  type PageResponse,
} from '../../shared/types/index.js';

export interface CursorStreamOptions {
  /**
   * Cursor to start from
   * @default Cursors.notStarted()
   */
  initialCursor?: Cursor;

  /**
   * Logger name, useful when several listings run side by side
   * @default 'CursorStream'
   */
  name?: string;
}

export class CursorStream<T> implements AsyncIterableIterator<T> {
  private cursor: Cursor;
  private buffer: readonly T[] = [];
  private offset = 0;
  private pagesFetched = 0;
  private readonly logger: ServiceLogger;

  constructor(
    private readonly fetchPage: PageFetcher<T>,
    options: CursorStreamOptions = {}
  ) {
    this.cursor = options.initialCursor ?? Cursors.notStarted();
    this.logger = createServiceLogger(options.name ?? 'CursorStream');
  }

  /**
   * Current cursor state
   */
  get position(): Cursor {
    return this.cursor;
  }

  /**
   * Number of remote page fetches issued so far
   */
  get fetchCount(): number {
    return this.pagesFetched;
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  async next(): Promise<IteratorResult<T, undefined>> {
    while (this.offset >= this.buffer.length) {
      const page = await this.nextPage();
      if (page === undefined) {
        return { done: true, value: undefined };
      }
      this.buffer = page;
      this.offset = 0;
    }

    const value = this.buffer[this.offset];
    this.offset++;
    return { done: false, value };
  }

  /**
   * Close the stream early; later pulls end without fetching
   */
  async return(): Promise<IteratorResult<T, undefined>> {
    this.buffer = [];
    this.offset = 0;
    this.cursor = Cursors.exhausted();
    return { done: true, value: undefined };
  }

  /**
   * Iterate page by page instead of item by item
   *
   * Shares cursor state with the item iterator; items already buffered by
   * item iteration are handed out first as one page.
   */
  async *pages(): AsyncGenerator<readonly T[], void, undefined> {
    if (this.offset < this.buffer.length) {
      const buffered = this.buffer.slice(this.offset);
      this.buffer = [];
      this.offset = 0;
      yield buffered;
    }

    while (true) {
      const page = await this.nextPage();
      if (page === undefined) {
        return;
      }
      yield page;
    }
  }

  /**
   * Drain the remaining items into an array
   */
  async collect(): Promise<T[]> {
    const items: T[] = [];
    for await (const item of this) {
      items.push(item);
    }
    return items;
  }

  /**
   * Fetch the next page, or undefined once the listing is exhausted
   */
  private async nextPage(): Promise<readonly T[] | undefined> {
    if (this.cursor.kind === 'exhausted') {
      return undefined;
    }

    const requested = this.cursor;
    let response: PageResponse<T>;

    try {
      this.pagesFetched++;
      response = await this.fetchPage(requested);
    } catch (error) {
      this.cursor = Cursors.exhausted();
      log.methodError(
        this.logger,
        'nextPage',
        error instanceof Error ? error : new Error(String(error)),
        { pageNumber: this.pagesFetched }
      );
      throw error;
    }

    if (response.items === null || response.items === undefined) {
      return this.fail('Page result set is missing');
    }
    if (response.next.kind === 'not-started') {
      return this.fail('Page returned a not-started cursor as its continuation');
    }

    this.cursor = response.next;
    log.pageFetched(
      this.logger,
      this.pagesFetched,
      response.items.length,
      this.cursor.kind === 'exhausted'
    );
    return response.items;
  }

  private fail(message: string): never {
    this.cursor = Cursors.exhausted();
    const error = new InvalidResponseError(message);
    log.methodError(this.logger, 'nextPage', error, {
      pageNumber: this.pagesFetched,
    });
    throw error;
  }
}

/**
 * Create a CursorStream over a paged-fetch capability
 */
export function paginate<T>(
  fetchPage: PageFetcher<T>,
  options: CursorStreamOptions = {}
): CursorStream<T> {
  return new CursorStream(fetchPage, options);
}
