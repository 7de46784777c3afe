/**
 * Queue status snapshot, derived on every change and never persisted
 */
export interface QueueStatus {
  readonly isProcessing: boolean;
  readonly currentChartId: string | null;
  readonly pendingCount: number;
  /** Pending chart id -> 1-based rank; 1 runs next. The in-flight chart is not ranked. */
  readonly positions: Readonly<Record<string, number>>;
}

export const IDLE_QUEUE_STATUS: QueueStatus = Object.freeze({
  isProcessing: false,
  currentChartId: null,
  pendingCount: 0,
  positions: Object.freeze({}),
});
