/**
 * Command Context - Lazy service creation
 *
 * This is NOT a framework - just an object that knows how to build the
 * pipeline from configuration. Removes service wiring from handlers.
 */

import {
  createSystemClock,
  type ArchiveSourcePort,
  type ClockPort,
  type DatasetDecoderPort,
  type KeyValueStorePort,
} from '@chartlane/core';
import { loadConfig, type ChartlaneConfig } from '@chartlane/utils';
import { ChartIntegrityRegistry, FileKeyValueStore } from '@chartlane/storage';
import {
  ArchiveExtractor,
  ChartLoadingService,
  FaultInjectingDecoder,
  FileArchiveSource,
  Iso8211LeaderDecoder,
  type Iso8211Summary,
} from '@chartlane/ingestion';
import { ChartLoadQueue } from '@chartlane/jobs';

/**
 * Overrides for testing; anything left out is built from configuration
 */
export interface CommandContextOptions {
  config?: ChartlaneConfig;
  store?: KeyValueStorePort;
  archiveSource?: ArchiveSourcePort;
  decoder?: DatasetDecoderPort<Iso8211Summary>;
  clock?: ClockPort;
  /** Backoff wait handed to the loader and the fault injector */
  sleep?: (ms: number) => Promise<void>;
  /** Progress notices, stderr by default */
  notify?: (text: string) => void;
}

export interface LoaderOptions {
  /** Overrides diagnostics.verbose from configuration */
  verbose?: boolean;
  /** Fail the first N decode attempts transiently */
  injectFailures?: number;
}

export class CommandContext {
  private _config: ChartlaneConfig | null = null;
  private _registry: Promise<ChartIntegrityRegistry> | null = null;
  private readonly _options: CommandContextOptions;

  constructor(options: CommandContextOptions = {}) {
    this._options = options;
  }

  get config(): ChartlaneConfig {
    if (this._config === null) {
      this._config = this._options.config ?? loadConfig();
    }
    return this._config;
  }

  get clock(): ClockPort {
    return this._options.clock ?? createSystemClock();
  }

  /**
   * Integrity registry, opened once per context
   */
  registry(): Promise<ChartIntegrityRegistry> {
    if (this._registry === null) {
      const store = this._options.store ?? new FileKeyValueStore(this.config.registry.dir);
      this._registry = ChartIntegrityRegistry.open(store, { clock: this._options.clock });
    }
    return this._registry;
  }

  notify(text: string): void {
    if (this._options.notify) {
      this._options.notify(text);
    } else {
      process.stderr.write(`${text}\n`);
    }
  }

  archiveSource(): ArchiveSourcePort {
    return this._options.archiveSource ?? new FileArchiveSource();
  }

  extractor(): ArchiveExtractor {
    return new ArchiveExtractor();
  }

  async loader(options: LoaderOptions = {}): Promise<ChartLoadingService<Iso8211Summary>> {
    const baseDecoder = this._options.decoder ?? new Iso8211LeaderDecoder();
    const decoder =
      options.injectFailures !== undefined && options.injectFailures > 0
        ? new FaultInjectingDecoder(baseDecoder, {
            failures: options.injectFailures,
            sleep: this._options.sleep,
          })
        : baseDecoder;

    return new ChartLoadingService(
      {
        archiveSource: this.archiveSource(),
        registry: await this.registry(),
        decoder,
        clock: this._options.clock,
      },
      {
        maxRetries: this.config.retry.maxRetries,
        initialDelayMs: this.config.retry.initialDelayMs,
        verbose: options.verbose ?? this.config.diagnostics.verbose,
        sleep: this._options.sleep,
      }
    );
  }

  queue(loader: ChartLoadingService<Iso8211Summary>, expectedPath?: string): ChartLoadQueue<Iso8211Summary> {
    return new ChartLoadQueue({
      load: (request) => loader.load(request, { expectedPath }),
    });
  }
}
