import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createChartLoadRequest } from '@chartlane/core';
import { ChartIntegrityRegistry, InMemoryKeyValueStore } from '@chartlane/storage';
import {
  PROGRESS_SIGNAL_THRESHOLD_MS,
  ProgressSignal,
  type ProgressEvent,
} from '../../src/loading/ProgressSignal.js';
import { ChartLoadingService } from '../../src/loading/ChartLoadingService.js';
import { FaultInjectingDecoder } from '../../src/decoders/FaultInjectingDecoder.js';
import { InMemoryArchiveSource, buildArchive, byteLengthDecoder } from '../helpers/fixtures.js';

type Recorded = [name: 'started' | 'cleared', elapsedMs: number];

function record(signal: ProgressSignal): Recorded[] {
  const events: Recorded[] = [];
  signal.on('started', (event: ProgressEvent) => events.push(['started', event.elapsedMs]));
  signal.on('cleared', (event: ProgressEvent) => events.push(['cleared', event.elapsedMs]));
  return events;
}

describe('ProgressSignal', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should use a 500 ms threshold', () => {
    expect(PROGRESS_SIGNAL_THRESHOLD_MS).toBe(500);
  });

  it('should stay silent for operations shorter than the threshold', () => {
    const signal = new ProgressSignal();
    const events = record(signal);

    const stop = signal.track('US5WA50M');
    vi.advanceTimersByTime(499);
    stop();
    vi.advanceTimersByTime(10_000);

    expect(events).toEqual([]);
    expect(signal.activeCount).toBe(0);
  });

  it('should announce at the threshold and clear exactly once', () => {
    const signal = new ProgressSignal();
    const events = record(signal);

    const stop = signal.track('US5WA50M');
    vi.advanceTimersByTime(500);
    vi.advanceTimersByTime(700);
    stop();
    stop();

    expect(events).toEqual([
      ['started', 500],
      ['cleared', 1200],
    ]);
  });

  describe('during a chart load', () => {
    async function createLoader(latencyMs: number, kind: 'retryable' | 'permanent', failures: number) {
      const source = new InMemoryArchiveSource().set(
        'charts/us5wa50m.zip',
        buildArchive({ 'ENC_ROOT/US5WA50M/US5WA50M.000': 'dataset bytes' })
      );
      const registry = await ChartIntegrityRegistry.open(new InMemoryKeyValueStore());
      const decoder = new FaultInjectingDecoder(byteLengthDecoder, { failures, kind, latencyMs });
      return new ChartLoadingService({ archiveSource: source, registry, decoder });
    }

    it('should start after 500 ms of a 2000 ms load and clear at completion', async () => {
      const service = await createLoader(2000, 'retryable', 0);
      const events = record(service.progress);

      const pending = service.load(
        createChartLoadRequest({ chartId: 'US5WA50M', archivePath: 'charts/us5wa50m.zip' })
      );
      await vi.advanceTimersByTimeAsync(499);
      expect(events).toEqual([]);

      await vi.advanceTimersByTimeAsync(1);
      expect(events).toEqual([['started', 500]]);

      await vi.advanceTimersByTimeAsync(1500);
      const result = await pending;
      expect(result.status).toBe('success');
      expect(events.map(([name]) => name)).toEqual(['started', 'cleared']);
      expect(events[1]?.[1]).toBeGreaterThanOrEqual(2000);

      await vi.advanceTimersByTimeAsync(5000);
      expect(events).toHaveLength(2);
    });

    it('should clear when a slow load fails', async () => {
      const service = await createLoader(800, 'permanent', 1);
      const events = record(service.progress);

      const pending = service.load(
        createChartLoadRequest({ chartId: 'US5WA50M', archivePath: 'charts/us5wa50m.zip' })
      );
      await vi.advanceTimersByTimeAsync(800);
      const result = await pending;

      expect(result.status).toBe('failure');
      expect(events.map(([name]) => name)).toEqual(['started', 'cleared']);
      expect(service.progress.activeCount).toBe(0);
    });
  });
});
