/**
 * Continuation Cursor
 *
 * Position of a paged listing: before the first page, at a continuation
 * token, or past the last page. "No token yet" and "no more pages" are
 * different states.
 */

export type Cursor =
  | { readonly kind: 'not-started' }
  | { readonly kind: 'continue'; readonly token: string }
  | { readonly kind: 'exhausted' };

export type CursorKind = Cursor['kind'];

const NOT_STARTED: Cursor = Object.freeze({ kind: 'not-started' });
const EXHAUSTED: Cursor = Object.freeze({ kind: 'exhausted' });

export const Cursors = {
  notStarted: (): Cursor => NOT_STARTED,

  exhausted: (): Cursor => EXHAUSTED,

  /**
   * @throws Error if the token is empty (an empty token is not a position)
   */
  continueFrom: (token: string): Cursor => {
    if (token.length === 0) {
      throw new Error('Continuation token must not be empty');
    }
    return { kind: 'continue', token };
  },
};

/**
 * Translate the next-page token returned with a page into a cursor.
 *
 * Only valid for a token that came back WITH a page: at that point a
 * missing or empty token means there is nothing left to fetch.
 *
 * @example
 * ```typescript
 * cursorFromToken('abc');     // { kind: 'continue', token: 'abc' }
 * cursorFromToken(undefined); // { kind: 'exhausted' }
 * cursorFromToken('');        // { kind: 'exhausted' }
 * ```
 */
export function cursorFromToken(token: string | null | undefined): Cursor {
  if (token === undefined || token === null || token.length === 0) {
    return Cursors.exhausted();
  }
  return Cursors.continueFrom(token);
}

/**
 * Token to send with a page request, or undefined for the first page.
 *
 * @throws Error for an exhausted cursor: there is no request to make
 */
export function cursorToToken(cursor: Cursor): string | undefined {
  switch (cursor.kind) {
    case 'not-started':
      return undefined;
    case 'continue':
      return cursor.token;
    case 'exhausted':
      throw new Error('Cannot request a page past an exhausted cursor');
  }
}

export function isExhausted(cursor: Cursor): boolean {
  return cursor.kind === 'exhausted';
}
