/**
 * ProgressSignal - "still loading" notification channel
 *
 * Emits `started` once an operation has run for PROGRESS_SIGNAL_THRESHOLD_MS and
 * `cleared` when that operation ends. An operation that ends before the
 * threshold emits nothing. After `cleared` the operation emits nothing more.
 */

import { EventEmitter } from 'events';
import { createSystemClock, type ClockPort } from '@chartlane/core';

/**
 * Fixed threshold, not read from configuration
 */
export const PROGRESS_SIGNAL_THRESHOLD_MS = 500;

export interface ProgressEvent {
  chartId: string;
  elapsedMs: number;
}

/**
 * Ends one tracked operation. Safe to call more than once.
 */
export type ProgressStop = () => void;

export class ProgressSignal extends EventEmitter {
  private readonly clock: ClockPort;
  private active = 0;

  constructor(clock: ClockPort = createSystemClock()) {
    super();
    this.clock = clock;
  }

  /**
   * Operations currently tracked
   */
  get activeCount(): number {
    return this.active;
  }

  /**
   * Start tracking an operation. The returned stop function cancels the
   * pending timer, so no `started` can fire after the operation ended.
   */
  track(chartId: string): ProgressStop {
    const startedAt = this.clock.nowMs();
    let announced = false;
    let stopped = false;
    this.active++;

    const timer = setTimeout(() => {
      announced = true;
      this.emit('started', { chartId, elapsedMs: this.clock.nowMs() - startedAt } satisfies ProgressEvent);
    }, PROGRESS_SIGNAL_THRESHOLD_MS);

    return () => {
      if (stopped) {
        return;
      }
      stopped = true;
      this.active--;
      clearTimeout(timer);
      if (announced) {
        this.emit('cleared', { chartId, elapsedMs: this.clock.nowMs() - startedAt } satisfies ProgressEvent);
      }
    };
  }
}
