/**
 * Unit tests for ChartLoadQueue
 *
 * A controlled loader lets each test decide when a load settles.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  IDLE_QUEUE_STATUS,
  createChartLoadRequest,
  type ChartLoadRequest,
  type LoadResult,
  type QueueStatus,
} from '@chartlane/core';
import { QueueClosedError, StorageError } from '@chartlane/utils';
import { ChartLoadQueue, type ChartLoader } from '../../src/chart-load-queue.js';

function request(chartId: string, archivePath = 'charts.zip'): ChartLoadRequest {
  return createChartLoadRequest({ chartId, archivePath });
}

function successFor(chartId: string): LoadResult<string> {
  return {
    status: 'success',
    chartId,
    bytes: new Uint8Array(0),
    features: chartId,
    retryCount: 0,
    entryPath: `${chartId}.000`,
    contentHash: 'a'.repeat(64),
    integrity: 'first-observation',
    durationMs: 0,
  };
}

class ControlledLoader implements ChartLoader<string> {
  started: string[] = [];
  active = 0;
  maxActive = 0;
  private waiting = new Map<string, { resolve: (r: LoadResult<string>) => void; reject: (e: unknown) => void }>();

  load(req: ChartLoadRequest): Promise<LoadResult<string>> {
    this.started.push(req.chartId);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    return new Promise((resolve, reject) => {
      this.waiting.set(req.chartId, {
        resolve: (result) => {
          this.active--;
          resolve(result);
        },
        reject: (error) => {
          this.active--;
          reject(error);
        },
      });
    });
  }

  finish(chartId: string): void {
    this.take(chartId).resolve(successFor(chartId));
  }

  fail(chartId: string, error: unknown): void {
    this.take(chartId).reject(error);
  }

  private take(chartId: string) {
    const waiter = this.waiting.get(chartId);
    if (!waiter) {
      throw new Error(`${chartId} is not in flight`);
    }
    this.waiting.delete(chartId);
    return waiter;
  }
}

describe('ChartLoadQueue', () => {
  let loader: ControlledLoader;
  let queue: ChartLoadQueue<string>;

  beforeEach(() => {
    loader = new ControlledLoader();
    queue = new ChartLoadQueue(loader);
  });

  describe('ordering', () => {
    it('should run one load at a time in enqueue order', async () => {
      const completed: string[] = [];
      const all = ['A', 'B', 'C'].map((id) =>
        queue.enqueue(request(id)).then((result) => completed.push(result.chartId))
      );

      expect(loader.started).toEqual(['A']);

      loader.finish('A');
      await Promise.resolve();
      await Promise.resolve();
      expect(loader.started).toEqual(['A', 'B']);

      loader.finish('B');
      await Promise.resolve();
      await Promise.resolve();
      loader.finish('C');
      await Promise.all(all);

      expect(completed).toEqual(['A', 'B', 'C']);
      expect(loader.maxActive).toBe(1);
    });

    it('should keep FIFO order when later loads are faster', async () => {
      const durations: Record<string, number> = { A: 30, B: 10, C: 1 };
      const timed: ChartLoader<string> = {
        load: (req) =>
          new Promise((resolve) => setTimeout(() => resolve(successFor(req.chartId)), durations[req.chartId])),
      };
      const timedQueue = new ChartLoadQueue(timed);
      const completed: string[] = [];

      await Promise.all(
        ['A', 'B', 'C'].map((id) =>
          timedQueue.enqueue(request(id)).then((result) => completed.push(result.chartId))
        )
      );

      expect(completed).toEqual(['A', 'B', 'C']);
    });
  });

  describe('status', () => {
    it('should rank pending charts from 1 and leave the in-flight chart unranked', async () => {
      const first = queue.enqueue(request('A'));
      void queue.enqueue(request('B'));
      void queue.enqueue(request('C'));

      expect(queue.status()).toEqual({
        isProcessing: true,
        currentChartId: 'A',
        pendingCount: 2,
        positions: { B: 1, C: 2 },
      });
      expect(queue.positionOf('C')).toBe(2);
      expect(queue.positionOf('A')).toBeNull();

      loader.finish('A');
      await first;

      expect(queue.status()).toEqual({
        isProcessing: true,
        currentChartId: 'B',
        pendingCount: 1,
        positions: { C: 1 },
      });
    });

    it('should report idle when empty', () => {
      expect(queue.status()).toEqual({
        isProcessing: false,
        currentChartId: null,
        pendingCount: 0,
        positions: {},
      });
      expect(queue.status()).toBe(IDLE_QUEUE_STATUS);
      expect(queue.isIdle).toBe(true);
    });

    it('should emit a status event on every change', async () => {
      const seen: Array<[string | null, number]> = [];
      queue.on('status', (status: QueueStatus) => seen.push([status.currentChartId, status.pendingCount]));

      const done = queue.enqueue(request('A'));
      loader.finish('A');
      await done;

      expect(seen).toEqual([
        [null, 1],
        ['A', 0],
        [null, 0],
      ]);
    });
  });

  describe('de-duplication', () => {
    it('should share the promise of an identical pending request', () => {
      void queue.enqueue(request('A'));
      const first = queue.enqueue(request('B'));
      const second = queue.enqueue(request('B'));

      expect(second).toBe(first);
      expect(queue.status().pendingCount).toBe(1);
    });

    it('should queue again a chart that is already in flight', () => {
      void queue.enqueue(request('A'));
      void queue.enqueue(request('A'));

      expect(queue.status()).toMatchObject({ currentChartId: 'A', pendingCount: 1 });
    });

    it('should not merge requests for different archives', () => {
      void queue.enqueue(request('A'));
      void queue.enqueue(request('B', 'one.zip'));
      void queue.enqueue(request('B', 'two.zip'));

      expect(queue.status().pendingCount).toBe(2);
    });
  });

  describe('failures and lifecycle', () => {
    it('should reject only the request whose load threw', async () => {
      const a = queue.enqueue(request('A'));
      const b = queue.enqueue(request('B'));
      const c = queue.enqueue(request('C'));

      loader.finish('A');
      await a;
      loader.fail('B', new StorageError('disk full', 'put'));
      await expect(b).rejects.toBeInstanceOf(StorageError);
      loader.finish('C');

      await expect(c).resolves.toMatchObject({ status: 'success', chartId: 'C' });
    });

    it('should refuse new work after close but finish accepted work', async () => {
      const a = queue.enqueue(request('A'));
      const b = queue.enqueue(request('B'));
      const closed = queue.close();

      await expect(queue.enqueue(request('C'))).rejects.toBeInstanceOf(QueueClosedError);

      loader.finish('A');
      await a;
      loader.finish('B');
      await b;
      await closed;

      expect(loader.started).toEqual(['A', 'B']);
      expect(queue.isIdle).toBe(true);
    });

    it('should resolve onIdle and emit idle once drained', async () => {
      let idleEvents = 0;
      queue.on('idle', () => {
        idleEvents++;
      });
      await queue.onIdle();

      void queue.enqueue(request('A'));
      const idle = queue.onIdle();
      loader.finish('A');
      await idle;

      expect(idleEvents).toBe(1);
    });
  });
});
