/**
 * HTTP Job API Type Definitions
 *
 * Wire shapes of the JSON job API spoken by HttpJobClient.
 */

/**
 * Body of `POST /jobs`
 */
export interface SubmitJobRequest<TParams> {
  params: TParams;
}

/**
 * Body of a `GET /jobs/:id/results` response
 */
export interface ResultsPageWire {
  items?: unknown[] | null;
  /** Token of the next page; null, missing or empty on the last page */
  nextCursor?: string | null;
}

/**
 * One record of a `POST /batches` request, data base64-encoded
 */
export interface BatchRecordWire {
  data: string;
  partitionKey: string;
  explicitHashKey?: string;
}

/**
 * Turns one raw result item into the caller's item type
 *
 * Should throw on an item it cannot read.
 */
export type ItemDecoder<TItem> = (raw: unknown) => TItem;
