/**
 * Chart Load Queue
 * ================
 *
 * Serializes chart loads: strictly one in flight, FIFO by enqueue order.
 * One archive's bytes are resident at a time, and registry writes never race
 * across requests.
 *
 * Flow:
 * 1. enqueue() appends a request and returns a promise of its LoadResult
 * 2. when nothing is in flight the head of the queue starts at once
 * 3. when the active load settles the next one starts in the same turn
 *
 * No priorities and no cancellation; every accepted request runs to a terminal
 * result. A loader rejection (registry storage failure) rejects only that
 * request's promise.
 *
 * Events:
 * - 'status' (QueueStatus) after every enqueue, start and completion
 * - 'idle' when the last request settles
 */

import { EventEmitter } from 'events';
import {
  IDLE_QUEUE_STATUS,
  isLoadFailure,
  type ChartLoadRequest,
  type LoadResult,
  type QueueStatus,
} from '@chartlane/core';
import { QueueClosedError, createLogger } from '@chartlane/utils';

const logger = createLogger('jobs');

/**
 * Anything that loads one chart; ChartLoadingService satisfies this
 */
export interface ChartLoader<F> {
  load(request: ChartLoadRequest): Promise<LoadResult<F>>;
}

interface QueueEntry<F> {
  request: ChartLoadRequest;
  promise: Promise<LoadResult<F>>;
  resolve: (result: LoadResult<F>) => void;
  reject: (error: unknown) => void;
}

export class ChartLoadQueue<F = unknown> extends EventEmitter {
  private pending: QueueEntry<F>[] = [];
  private current: QueueEntry<F> | null = null;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly loader: ChartLoader<F>) {
    super();
  }

  /**
   * Queue a load. A request for the same chart and archive that is still
   * pending shares that request's promise instead of queueing twice.
   */
  enqueue(request: ChartLoadRequest): Promise<LoadResult<F>> {
    if (this.closed) {
      return Promise.reject(new QueueClosedError({ chartId: request.chartId }));
    }

    const duplicate = this.pending.find(
      (entry) =>
        entry.request.chartId === request.chartId && entry.request.archivePath === request.archivePath
    );
    if (duplicate) {
      logger.debug('Request already pending, sharing its result', { chartId: request.chartId });
      return duplicate.promise;
    }

    let resolve: (result: LoadResult<F>) => void = () => undefined;
    let reject: (error: unknown) => void = () => undefined;
    const promise = new Promise<LoadResult<F>>((res, rej) => {
      resolve = res;
      reject = rej;
    });

    this.pending.push({ request, promise, resolve, reject });
    logger.debug('Chart load queued', {
      chartId: request.chartId,
      position: this.pending.length,
      busy: this.current !== null,
    });
    this.emitStatus();
    this.startNext();

    return promise;
  }

  /**
   * Current snapshot; positions rank pending charts from 1, the in-flight chart is not ranked
   */
  status(): QueueStatus {
    if (this.isIdle) {
      return IDLE_QUEUE_STATUS;
    }

    const positions: Record<string, number> = {};
    this.pending.forEach((entry, index) => {
      if (!(entry.request.chartId in positions)) {
        positions[entry.request.chartId] = index + 1;
      }
    });

    return Object.freeze({
      isProcessing: this.current !== null,
      currentChartId: this.current?.request.chartId ?? null,
      pendingCount: this.pending.length,
      positions: Object.freeze(positions),
    });
  }

  /**
   * 1-based rank of a pending chart, or null when it is not waiting
   */
  positionOf(chartId: string): number | null {
    const index = this.pending.findIndex((entry) => entry.request.chartId === chartId);
    return index === -1 ? null : index + 1;
  }

  get isIdle(): boolean {
    return this.current === null && this.pending.length === 0;
  }

  /**
   * Resolves once nothing is pending or in flight
   */
  onIdle(): Promise<void> {
    if (this.isIdle) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Refuse new requests; already accepted ones still run. Resolves when drained.
   */
  close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      logger.info('Chart load queue closed', { pendingCount: this.pending.length });
    }
    return this.onIdle();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private startNext(): void {
    if (this.current !== null) {
      return;
    }

    const next = this.pending.shift();
    if (!next) {
      this.notifyIdle();
      return;
    }

    this.current = next;
    this.emitStatus();
    void this.process(next);
  }

  private async process(entry: QueueEntry<F>): Promise<void> {
    try {
      const result = await this.loader.load(entry.request);
      logger.debug('Chart load settled', {
        chartId: entry.request.chartId,
        outcome: isLoadFailure(result) ? result.error.kind : 'success',
      });
      entry.resolve(result);
    } catch (error) {
      logger.error('Chart load rejected', error, { chartId: entry.request.chartId });
      entry.reject(error);
    } finally {
      this.current = null;
      this.emitStatus();
      this.startNext();
    }
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    this.emit('idle');
    for (const resolve of waiters) {
      resolve();
    }
  }

  private emitStatus(): void {
    this.emit('status', this.status());
  }
}
