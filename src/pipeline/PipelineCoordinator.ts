import { EventEmitter } from 'events';
import * as os from 'os';
import { entityIdentifier } from '../entities/EntityDescriptor';
import { EntityDescriptor } from '../entities/types';
import { ObjectStoreClient } from '../s3/types';
import { ProcessedObjectOracle } from '../state/types';
import { Channel } from './Channel';
import { ObjectDownloader } from './ObjectDownloader';
import { ObjectLister } from './ObjectLister';
import { CandidateObject, DownloadedObject, PipelineConfig } from './types';

export const DEFAULT_PIPELINE_CONFIG: Omit<PipelineConfig, 'tempDirectory'> = {
  pollIntervalMs: 5 * 60 * 1000,
  backfillWindowMs: 60 * 60 * 1000,
  tempFilePrefix: 'entity-ingest',
  now: () => new Date()
};

/**
 * Runs the lister and the downloader for one entity, connected by an
 * unbuffered channel. Single use: `start` may be called once.
 *
 * A listing failure closes the output channel with the ListingError, so the
 * consumer's iteration throws it and the caller decides whether to exit.
 *
 * Events: `cycleComplete` (CycleSummary) after each polling cycle,
 * `downloadError` (DownloadError) for each dropped object.
 */
export class PipelineCoordinator extends EventEmitter {
  private store: ObjectStoreClient;
  private oracle: ProcessedObjectOracle;
  private entity: EntityDescriptor;
  private config: PipelineConfig;
  private controller = new AbortController();
  private candidates = new Channel<CandidateObject>();
  private output = new Channel<DownloadedObject>();
  private tasks: Promise<void>[] = [];
  private started = false;

  constructor(
    store: ObjectStoreClient,
    oracle: ProcessedObjectOracle,
    entity: EntityDescriptor,
    config: Partial<PipelineConfig> = {}
  ) {
    super();
    this.store = store;
    this.oracle = oracle;
    this.entity = entity;
    this.config = {
      ...DEFAULT_PIPELINE_CONFIG,
      tempDirectory: os.tmpdir(),
      ...config
    };
  }

  start(): Channel<DownloadedObject> {
    if (this.started) {
      throw new Error(`Pipeline for ${entityIdentifier(this.entity)} has already been started`);
    }
    this.started = true;

    const { signal } = this.controller;

    const lister = new ObjectLister(this.store, this.oracle, this.entity, this.candidates, {
      pollIntervalMs: this.config.pollIntervalMs,
      backfillWindowMs: this.config.backfillWindowMs,
      now: this.config.now,
      onCycleComplete: (summary) => this.emit('cycleComplete', summary)
    });

    const downloader = new ObjectDownloader(this.store, this.entity, this.candidates, this.output, {
      tempDirectory: this.config.tempDirectory,
      tempFilePrefix: this.config.tempFilePrefix,
      now: this.config.now,
      onError: (error) => this.emit('downloadError', error)
    });

    console.log('Starting log object pipeline', {
      entity: entityIdentifier(this.entity),
      pollIntervalMs: this.config.pollIntervalMs,
      backfillWindowMs: this.config.backfillWindowMs,
      tempDirectory: this.config.tempDirectory
    });

    // A consumer that stops iterating takes the whole pipeline down with it
    this.output.onClose(() => this.shutdown());

    this.tasks = [
      lister.run(signal).catch((error) => this.fail(error)),
      downloader.run(signal).catch((error) => this.fail(error))
    ];

    return this.output;
  }

  /**
   * Cancel both loops and close the channels
   */
  async stop(): Promise<void> {
    this.shutdown();
    await Promise.all(this.tasks);
  }

  get isRunning(): boolean {
    return this.started && !this.controller.signal.aborted;
  }

  private fail(error: unknown): void {
    const failure = error instanceof Error ? error : new Error(String(error));
    console.error(`Log object pipeline for ${entityIdentifier(this.entity)} failed:`, failure);
    this.shutdown(failure);
  }

  private shutdown(error?: Error): void {
    this.controller.abort();
    this.candidates.close();
    this.output.close(error);
  }
}
