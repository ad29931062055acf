/**
 * HTTP Job API Client
 *
 * JobTransport and BatchTransport over a JSON HTTP API:
 *
 * - `POST /jobs`                      submit, body `{ params }`, returns `{ jobId }`
 * - `GET  /jobs/:id`                  status, `{ state, reason, ... }`; 404 means no record
 * - `GET  /jobs/:id/results?cursor=`  one page, `{ items, nextCursor }`
 * - `POST /batches`                   `{ records }` with base64 data, returns a BatchAck
 *
 * All requests go through a RequestScheduler, so calls are serialized with a
 * minimum spacing. Nothing is retried.
 *
 * Error mapping:
 * - network failure, or a non-2xx status: TransportError
 * - a 2xx body that is not JSON or misses required fields: InvalidResponseError
 */

import { Buffer } from 'node:buffer';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import {
  InvalidResponseError,
  TransportError,
  isJobRelayError,
} from '../../shared/errors/index.js';
import {
  cursorFromToken,
  cursorToToken,
  type BatchAck,
  type BatchEntryResult,
  type BatchRecord,
  type BatchTransport,
  type Cursor,
  type JobId,
  type JobStatusResponse,
  type JobTransport,
  type PageResponse,
  type SubmitJobResponse,
} from '../../shared/types/index.js';
import { RequestScheduler } from '../../utils/request-scheduler/index.js';
import type {
  BatchRecordWire,
  ItemDecoder,
  ResultsPageWire,
  SubmitJobRequest,
} from './types.js';

/**
 * Dependencies for HttpJobClient
 */
export interface HttpJobClientDependencies<TItem> {
  /** API root, e.g. 'https://jobs.example.com/v1' */
  baseUrl: string;

  /** Reads one result item off the wire */
  decodeItem: ItemDecoder<TItem>;

  /** Extra headers for every request (credentials go here) */
  headers?: Record<string, string>;

  /**
   * Minimum spacing between requests, used when no scheduler is given
   * @default 200
   */
  minSpacingMs?: number;

  /**
   * Request scheduler for rate limiting
   * @default new RequestScheduler({ minSpacingMs, name: 'HttpJobScheduler' })
   */
  requestScheduler?: RequestScheduler;

  /**
   * fetch implementation
   * @default globalThis.fetch
   */
  fetch?: typeof fetch;
}

type HttpMethod = 'GET' | 'POST';

export class HttpJobClient<TParams, TItem>
  implements JobTransport<TParams, TItem>, BatchTransport<BatchRecord, BatchAck>
{
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly decodeItem: ItemDecoder<TItem>;
  private readonly requestScheduler: RequestScheduler;
  private readonly fetchFn: typeof fetch;
  private readonly logger: ServiceLogger;

  constructor(dependencies: HttpJobClientDependencies<TItem>) {
    this.logger = createServiceLogger('HttpJobClient');

    this.baseUrl = dependencies.baseUrl.replace(/\/+$/, '');
    this.headers = dependencies.headers ?? {};
    this.decodeItem = dependencies.decodeItem;
    this.fetchFn = dependencies.fetch ?? ((input, init) => fetch(input, init));
    this.requestScheduler =
      dependencies.requestScheduler ??
      new RequestScheduler({
        minSpacingMs: dependencies.minSpacingMs ?? 200,
        name: 'HttpJobScheduler',
      });

    this.logger.info({ baseUrl: this.baseUrl }, 'HttpJobClient initialized');
  }

  async submit(params: TParams): Promise<SubmitJobResponse> {
    const request: SubmitJobRequest<TParams> = { params };
    const body = await this.requestJson('POST', '/jobs', request);

    if (!isRecord(body)) {
      throw new InvalidResponseError('Submission response is not an object');
    }
    const { jobId } = body;
    return { jobId: typeof jobId === 'string' ? jobId : null };
  }

  async pollStatus(jobId: JobId): Promise<JobStatusResponse | null> {
    const body = await this.requestJson('GET', `/jobs/${encodeURIComponent(jobId)}`, undefined, {
      notFoundAsNull: true,
    });
    if (body === null) {
      return null;
    }

    if (!isRecord(body)) {
      throw new InvalidResponseError(`Status response of job ${jobId} is not an object`);
    }
    const { state, reason } = body;
    return {
      state: typeof state === 'string' ? state : null,
      reason: typeof reason === 'string' ? reason : null,
      detail: body,
    };
  }

  async fetchPage(jobId: JobId, cursor: Cursor): Promise<PageResponse<TItem>> {
    const token = cursorToToken(cursor);
    const query = token === undefined ? '' : `?cursor=${encodeURIComponent(token)}`;
    const body = await this.requestJson(
      'GET',
      `/jobs/${encodeURIComponent(jobId)}/results${query}`
    );

    if (!isRecord(body)) {
      throw new InvalidResponseError(`Results page of job ${jobId} is not an object`);
    }
    const { items, nextCursor } = body;
    const page: ResultsPageWire = {
      items: Array.isArray(items) ? items : null,
      nextCursor: typeof nextCursor === 'string' ? nextCursor : null,
    };

    return {
      items: page.items?.map((raw) => this.decodeItem(raw)) ?? null,
      next: cursorFromToken(page.nextCursor),
    };
  }

  async submitBatch(entries: readonly BatchRecord[]): Promise<BatchAck> {
    const records: BatchRecordWire[] = entries.map((entry) => ({
      data: Buffer.from(entry.data).toString('base64'),
      partitionKey: entry.partitionKey,
      ...(entry.explicitHashKey !== undefined ? { explicitHashKey: entry.explicitHashKey } : {}),
    }));

    const body = await this.requestJson('POST', '/batches', { records });
    return parseBatchAck(body);
  }

  /**
   * Scheduled request returning the parsed JSON body
   *
   * @returns Parsed body, or null for a 404 when `notFoundAsNull` is set
   * @throws TransportError for network failures and non-2xx statuses
   * @throws InvalidResponseError for a body that is not JSON
   */
  private async requestJson(
    method: HttpMethod,
    path: string,
    body?: unknown,
    options: { notFoundAsNull?: boolean } = {}
  ): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    log.externalApiCall(this.logger, 'HttpJobApi', `${method} ${path}`);

    try {
      return await this.requestScheduler.schedule(async () => {
        let response: Response;
        try {
          response = await this.fetchFn(url, {
            method,
            headers: {
              Accept: 'application/json',
              ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
              ...this.headers,
            },
            body: body === undefined ? undefined : JSON.stringify(body),
          });
        } catch (error) {
          throw new TransportError(`${method} ${path} failed: network error`, undefined, {
            cause: error,
          });
        }

        if (response.status === 404 && options.notFoundAsNull) {
          return null;
        }
        if (!response.ok) {
          throw new TransportError(
            `${method} ${path} failed with HTTP ${response.status}`,
            response.status
          );
        }

        const text = await response.text();
        try {
          const parsed: unknown = JSON.parse(text);
          return parsed;
        } catch (error) {
          throw new InvalidResponseError(`${method} ${path} returned a body that is not JSON`, {
            cause: error,
          });
        }
      });
    } catch (error) {
      // Rethrow-or-wrap
      const failure = isJobRelayError(error)
        ? error
        : new TransportError(`${method} ${path} failed`, undefined, { cause: error });
      log.methodError(this.logger, 'requestJson', failure, { method, path });
      throw failure;
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parseBatchAck(body: unknown): BatchAck {
  const failedCount = isRecord(body) ? body.failedCount : undefined;
  const results = isRecord(body) ? body.results : undefined;
  if (typeof failedCount !== 'number' || !Array.isArray(results)) {
    throw new InvalidResponseError('Batch response is missing failedCount or results');
  }

  return {
    failedCount,
    results: results.map((raw: unknown): BatchEntryResult => {
      const result: Record<string, unknown> = isRecord(raw) ? raw : {};
      return {
        id: optionalString(result.id),
        errorCode: optionalString(result.errorCode),
        errorMessage: optionalString(result.errorMessage),
      };
    }),
  };
}
