/**
 * Test Fixtures for CursorStream Tests
 */

import { Cursors, type Cursor, type PageResponse } from '../../shared/types/index.js';

/**
 * A three-page listing: not-started -> A -> B -> exhausted
 */
export const THREE_PAGE_LISTING: ReadonlyArray<{
  expectedCursor: Cursor;
  response: PageResponse<string>;
}> = [
  {
    expectedCursor: Cursors.notStarted(),
    response: { items: ['row-1', 'row-2'], next: Cursors.continueFrom('A') },
  },
  {
    expectedCursor: Cursors.continueFrom('A'),
    response: { items: ['row-3'], next: Cursors.continueFrom('B') },
  },
  {
    expectedCursor: Cursors.continueFrom('B'),
    response: { items: ['row-4', 'row-5'], next: Cursors.exhausted() },
  },
];

/**
 * Page fetcher serving the given responses in order
 *
 * @throws Error when asked for more pages than provided
 */
export function servePages<T>(
  responses: ReadonlyArray<PageResponse<T>>
): (cursor: Cursor) => Promise<PageResponse<T>> {
  let index = 0;
  return async () => {
    const response = responses[index];
    index++;
    if (response === undefined) {
      throw new Error(`No page configured for call ${index}`);
    }
    return response;
  };
}
