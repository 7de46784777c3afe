/**
 * ChartLoadingService - load one chart from its archive
 *
 * Stages: extracting -> hashing -> verifying -> decoding -> succeeded | failed
 *
 * - extraction: invalid chart id, missing dataset, unreadable or corrupt archive
 *   fail at once
 * - verifying: a hash mismatch fails at once; a first observation is captured
 * - decoding: transient decoder failures are retried with exponential backoff
 *   (100, 200, 400, 800 ms by default); a permanent failure stops the loop
 *
 * Expected failures come back as a LoadFailure carrying a LoadError. Only
 * registry storage failures (StorageError) reject.
 */

import { EventEmitter } from 'events';
import {
  ChartIdSchema,
  LoadErrorKind,
  computeDatasetHash,
  createLoadError,
  createSystemClock,
  type ArchiveSourcePort,
  type ChartLoadRequest,
  type ClockPort,
  type DatasetDecoderPort,
  type DecodeOutcome,
  type IntegrityRegistryPort,
  type LoadFailure,
  type LoadResult,
  type LoadStage,
  type LoadSuccess,
} from '@chartlane/core';
import { createLogger, retryWithBackoff } from '@chartlane/utils';
import { ArchiveExtractor, type ExtractedDataset } from '../archive/ArchiveExtractor.js';
import { ProgressSignal } from './ProgressSignal.js';

const logger = createLogger('ingestion');

export const DEFAULT_MAX_DECODE_RETRIES = 4;
export const DEFAULT_INITIAL_BACKOFF_MS = 100;

export interface ChartLoadingDependencies<F> {
  archiveSource: ArchiveSourcePort;
  registry: IntegrityRegistryPort;
  decoder: DatasetDecoderPort<F>;
  extractor?: ArchiveExtractor;
  progress?: ProgressSignal;
  clock?: ClockPort;
}

export interface ChartLoadingOptions {
  /** @default 4 */
  maxRetries?: number;
  /** @default 100 */
  initialDelayMs?: number;
  /** Populate LoadError.technicalDetail */
  verbose?: boolean;
  /** Backoff wait; tests inject a recorder */
  sleep?: (ms: number) => Promise<void>;
}

export interface LoadOptions {
  /** Archive entry to try before the standard layouts */
  expectedPath?: string;
}

export interface StageEvent {
  chartId: string;
  stage: LoadStage;
  elapsedMs: number;
}

/**
 * One failed decode call, classified for the retry loop
 */
export class DecodeAttemptError extends Error {
  constructor(
    message: string,
    public readonly transient: boolean
  ) {
    super(message);
    this.name = 'DecodeAttemptError';
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ChartLoadingService<F = unknown> extends EventEmitter {
  private readonly archiveSource: ArchiveSourcePort;
  private readonly registry: IntegrityRegistryPort;
  private readonly decoder: DatasetDecoderPort<F>;
  private readonly extractor: ArchiveExtractor;
  private readonly clock: ClockPort;
  readonly progress: ProgressSignal;

  private readonly maxRetries: number;
  private readonly initialDelayMs: number;
  private readonly verbose: boolean;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(deps: ChartLoadingDependencies<F>, options: ChartLoadingOptions = {}) {
    super();
    this.archiveSource = deps.archiveSource;
    this.registry = deps.registry;
    this.decoder = deps.decoder;
    this.extractor = deps.extractor ?? new ArchiveExtractor();
    this.clock = deps.clock ?? createSystemClock();
    this.progress = deps.progress ?? new ProgressSignal(this.clock);

    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_DECODE_RETRIES;
    this.initialDelayMs = options.initialDelayMs ?? DEFAULT_INITIAL_BACKOFF_MS;
    this.verbose = options.verbose ?? false;
    this.sleep = options.sleep;
  }

  /**
   * Load one chart. Each call is independent; calling again re-reads the archive.
   */
  async load(request: ChartLoadRequest, options: LoadOptions = {}): Promise<LoadResult<F>> {
    const stopProgress = this.progress.track(request.chartId);
    try {
      return await this.run(request, options, this.clock.nowMs());
    } finally {
      stopProgress();
    }
  }

  private async run(
    request: ChartLoadRequest,
    options: LoadOptions,
    startedAt: number
  ): Promise<LoadResult<F>> {
    const { chartId, archivePath } = request;

    this.enterStage(chartId, 'extracting', startedAt);
    const validId = ChartIdSchema.safeParse(chartId);
    if (!validId.success) {
      return this.fail(
        chartId,
        LoadErrorKind.DatasetNotFound,
        startedAt,
        0,
        `Invalid chart id "${chartId}": ${validId.error.issues[0]?.message ?? 'rejected'}`
      );
    }

    let archive: Uint8Array;
    try {
      archive = await this.archiveSource.read(archivePath);
    } catch (error) {
      return this.fail(
        chartId,
        LoadErrorKind.ExtractionFailed,
        startedAt,
        0,
        `Could not read ${archivePath}: ${describeError(error)}`
      );
    }

    let extracted: ExtractedDataset | null;
    try {
      extracted = this.extractor.extract(archive, chartId, { expectedPath: options.expectedPath });
    } catch (error) {
      return this.fail(
        chartId,
        LoadErrorKind.ExtractionFailed,
        startedAt,
        0,
        `${archivePath}: ${describeError(error)}`
      );
    }
    if (!extracted) {
      return this.fail(
        chartId,
        LoadErrorKind.DatasetNotFound,
        startedAt,
        0,
        `No ${chartId}.000 entry in ${archivePath}`
      );
    }
    const dataset = extracted;

    this.enterStage(chartId, 'hashing', startedAt);
    const contentHash = computeDatasetHash(dataset.bytes);

    this.enterStage(chartId, 'verifying', startedAt);
    const classification = await this.registry.verifyAndCapture(chartId, contentHash);
    if (classification.kind === 'mismatch') {
      return this.fail(
        chartId,
        LoadErrorKind.IntegrityMismatch,
        startedAt,
        0,
        `${dataset.path}: expected ${classification.expectedHash}, computed ${classification.computedHash}`
      );
    }

    this.enterStage(chartId, 'decoding', startedAt);
    const outcome = await retryWithBackoff(
      async () => {
        let result: DecodeOutcome<F>;
        try {
          result = await this.decoder.decode(dataset.bytes);
        } catch (error) {
          throw new DecodeAttemptError(describeError(error), false);
        }
        if (result.status === 'decoded') {
          return result.features;
        }
        throw new DecodeAttemptError(result.reason, result.status === 'retryable');
      },
      {
        maxRetries: this.maxRetries,
        initialDelayMs: this.initialDelayMs,
        isRetryable: (error) => error instanceof DecodeAttemptError && error.transient,
        sleep: this.sleep,
        context: { chartId },
      }
    );

    if (!outcome.ok) {
      const attempts = outcome.retries + 1;
      const detail = outcome.exhausted
        ? `Gave up after ${attempts} attempts: ${describeError(outcome.error)}`
        : `Permanent failure on attempt ${attempts}: ${describeError(outcome.error)}`;
      return this.fail(chartId, LoadErrorKind.DecodeFailed, startedAt, outcome.retries, detail);
    }

    const durationMs = this.clock.nowMs() - startedAt;
    const success: LoadSuccess<F> = {
      status: 'success',
      chartId,
      bytes: dataset.bytes,
      features: outcome.value,
      retryCount: outcome.retries,
      entryPath: dataset.path,
      contentHash,
      integrity: classification.kind,
      durationMs,
    };

    this.enterStage(chartId, 'succeeded', startedAt);
    logger.info('Chart loaded', {
      chartId,
      entryPath: dataset.path,
      integrity: classification.kind,
      retryCount: outcome.retries,
      durationMs,
    });
    return Object.freeze(success);
  }

  private fail(
    chartId: string,
    kind: LoadErrorKind,
    startedAt: number,
    retryCount: number,
    technicalDetail: string
  ): LoadFailure {
    const error = createLoadError(
      { kind, chartId, retryCount, technicalDetail },
      { verbose: this.verbose, clock: this.clock }
    );
    const durationMs = this.clock.nowMs() - startedAt;

    this.enterStage(chartId, 'failed', startedAt);
    logger.warn('Chart load failed', { chartId, kind, retryCount, durationMs });

    const failure: LoadFailure = { status: 'failure', chartId, error, retryCount, durationMs };
    return Object.freeze(failure);
  }

  private enterStage(chartId: string, stage: LoadStage, startedAt: number): void {
    const event: StageEvent = { chartId, stage, elapsedMs: this.clock.nowMs() - startedAt };
    logger.debug('Load stage', { ...event });
    this.emit('stage', event);
  }
}
