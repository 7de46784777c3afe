/**
 * FaultInjectingDecoder - wraps a decoder and fails its first N calls
 *
 * Used by tests and by `chartlane chart load --inject-failures` to exercise
 * the retry path without touching the real decoder.
 */

import {
  permanentFailure,
  retryableFailure,
  type DatasetDecoderPort,
  type DecodeOutcome,
} from '@chartlane/core';
import { delay } from '@chartlane/utils';

export type InjectedFaultKind = 'retryable' | 'permanent';

export interface FaultInjectionOptions {
  /** Number of leading calls that fail */
  failures: number;
  /** @default 'retryable' */
  kind?: InjectedFaultKind;
  /** Added to every call before it resolves */
  latencyMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export class FaultInjectingDecoder<F> implements DatasetDecoderPort<F> {
  private calls = 0;
  private readonly kind: InjectedFaultKind;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly inner: DatasetDecoderPort<F>,
    private readonly options: FaultInjectionOptions
  ) {
    this.kind = options.kind ?? 'retryable';
    this.sleep = options.sleep ?? delay;
  }

  /** Calls made so far, failed ones included */
  get attempts(): number {
    return this.calls;
  }

  async decode(bytes: Uint8Array): Promise<DecodeOutcome<F>> {
    this.calls++;
    const call = this.calls;

    if (this.options.latencyMs !== undefined && this.options.latencyMs > 0) {
      await this.sleep(this.options.latencyMs);
    }

    if (call <= this.options.failures) {
      const reason = `Injected ${this.kind} failure ${call} of ${this.options.failures}`;
      return this.kind === 'retryable' ? retryableFailure(reason) : permanentFailure(reason);
    }

    return this.inner.decode(bytes);
  }
}
