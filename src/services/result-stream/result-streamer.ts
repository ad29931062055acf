/**
 * ResultStreamer
 *
 * Submits a job, waits for it to succeed, then streams its paged results.
 *
 * Nothing happens until the first pull: submission, waiting and the first
 * page fetch all run inside it. Any failure of the wait (failed, cancelled,
 * timed out, invalid) rejects that first pull and the stream yields nothing.
 *
 * @example
 * ```typescript
 * const streamer = new ResultStreamer({ transport: client });
 * for await (const row of streamer.stream(query, {
 *   timeoutMs: 60_000,
 *   checkIntervalMs: 1_000,
 * })) {
 *   console.log(row);
 * }
 * ```
 */

import { createServiceLogger } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import type { JobId, JobTransport, WaitOptions } from '../../shared/types/index.js';
import { CursorStream } from '../cursor-stream/index.js';
import { JobPoller } from '../job-poller/index.js';

export interface ResultStreamerDependencies<TParams, TItem> {
  /** Remote service adapter */
  transport: JobTransport<TParams, TItem>;

  /**
   * Poller to wait with
   * Defaults to a new JobPoller over the same transport
   */
  poller?: JobPoller<TParams>;
}

export class ResultStreamer<TParams, TItem> {
  private readonly transport: JobTransport<TParams, TItem>;
  private readonly poller: JobPoller<TParams>;
  private readonly logger: ServiceLogger;

  constructor(dependencies: ResultStreamerDependencies<TParams, TItem>) {
    this.transport = dependencies.transport;
    this.poller = dependencies.poller ?? new JobPoller({ transport: dependencies.transport });
    this.logger = createServiceLogger('ResultStreamer');
  }

  /**
   * Submit, wait and stream the results item by item
   */
  async *stream(
    params: TParams,
    options: WaitOptions
  ): AsyncGenerator<TItem, void, undefined> {
    const jobId = await this.poller.submitAndWait(params, options);
    yield* this.streamJob(jobId);
  }

  /**
   * Stream the results of a job that already succeeded
   *
   * Starts at the first page; the page fetcher is bound to `jobId`.
   */
  streamJob(jobId: JobId): CursorStream<TItem> {
    this.logger.debug({ jobId }, 'Streaming job results');
    return new CursorStream<TItem>((cursor) => this.transport.fetchPage(jobId, cursor), {
      name: `ResultStreamer:${jobId}`,
    });
  }

  /**
   * Submit, wait and collect every result item
   */
  async collect(params: TParams, options: WaitOptions): Promise<TItem[]> {
    const items: TItem[] = [];
    for await (const item of this.stream(params, options)) {
      items.push(item);
    }
    this.logger.info({ count: items.length }, 'Collected job results');
    return items;
  }
}
