import { setTimeout as sleep } from 'timers/promises';
import { entityBucket, entityIdentifier, objectPrefix } from '../entities/EntityDescriptor';
import { EntityDescriptor } from '../entities/types';
import { ObjectPage, ObjectStoreClient } from '../s3/types';
import { ProcessedObjectOracle } from '../state/types';
import { Channel } from './Channel';
import {
  CandidateObject,
  ChannelClosedError,
  CycleSummary,
  ListingError,
  PageFilterResult,
  PipelineConfig
} from './types';

export interface ObjectListerOptions extends Pick<PipelineConfig, 'pollIntervalMs' | 'backfillWindowMs' | 'now'> {
  onCycleComplete?: (summary: CycleSummary) => void;
}

/**
 * Select the objects of one listing page that should be downloaded.
 *
 * The page is sorted newest first. Meeting an already-processed key ends the
 * page and signals that paging should stop; objects at or beyond the backfill
 * window are dropped without stopping. The sort is per page only: listings
 * spanning several pages are not globally ordered.
 */
export function filterPage(
  objects: readonly CandidateObject[],
  processed: ReadonlySet<string>,
  now: Date,
  backfillWindowMs: number
): PageFilterResult {
  const sorted = [...objects].sort((a, b) => b.lastModified.getTime() - a.lastModified.getTime());
  const candidates: CandidateObject[] = [];
  let expired = 0;

  for (const obj of sorted) {
    if (processed.has(obj.key)) {
      return { candidates, expired, stoppedAt: obj.key };
    }

    if (now.getTime() - obj.lastModified.getTime() < backfillWindowMs) {
      candidates.push(obj);
    } else {
      expired++;
    }
  }

  return { candidates, expired };
}

export class ObjectLister {
  private store: ObjectStoreClient;
  private oracle: ProcessedObjectOracle;
  private entity: EntityDescriptor;
  private candidates: Channel<CandidateObject>;
  private options: ObjectListerOptions;

  constructor(
    store: ObjectStoreClient,
    oracle: ProcessedObjectOracle,
    entity: EntityDescriptor,
    candidates: Channel<CandidateObject>,
    options: ObjectListerOptions
  ) {
    this.store = store;
    this.oracle = oracle;
    this.entity = entity;
    this.candidates = candidates;
    this.options = options;
  }

  /**
   * Poll until the signal aborts. Listing failures end the loop with a
   * ListingError, left for the caller to log.
   */
  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const cycleStartedAt = Date.now();

      try {
        await this.listOnce(signal);
      } catch (error) {
        if (signal.aborted || error instanceof ChannelClosedError) {
          return;
        }
        throw error;
      }

      console.log('Pausing until the next set of logs are available', {
        entity: entityIdentifier(this.entity)
      });

      const delay = Math.max(0, this.options.pollIntervalMs - (Date.now() - cycleStartedAt));
      try {
        await sleep(delay, undefined, { signal });
      } catch (error) {
        if (signal.aborted) {
          return;
        }
        throw error;
      }
    }
  }

  /**
   * Run one polling cycle over today's prefix
   */
  async listOnce(signal?: AbortSignal): Promise<CycleSummary> {
    const startedAt = this.options.now();
    const bucket = entityBucket(this.entity);
    const prefix = objectPrefix(this.entity, startedAt);
    const entity = entityIdentifier(this.entity);

    console.log('Getting recent objects', { entity, bucket, prefix });

    const processed = await this.loadProcessedObjects();
    const summary: CycleSummary = {
      entity,
      prefix,
      startedAt,
      pages: 0,
      listed: 0,
      forwarded: 0,
      expired: 0
    };

    const onPage = async (page: ObjectPage): Promise<boolean> => {
      summary.pages++;
      summary.listed += page.objects.length;

      const result = filterPage(page.objects, processed, this.options.now(), this.options.backfillWindowMs);
      summary.expired += result.expired;

      for (const candidate of result.candidates) {
        await this.candidates.send(candidate);
        summary.forwarded++;
      }

      if (result.stoppedAt) {
        console.log('Already processed, skipping', { entity, object: result.stoppedAt });
        summary.stoppedAt = result.stoppedAt;
        return false;
      }

      return !page.lastPage;
    };

    try {
      await this.store.listObjectPages(bucket, prefix, onPage, signal);
    } catch (error) {
      if (error instanceof ChannelClosedError || signal?.aborted) {
        throw error;
      }
      throw new ListingError(
        `Failed to list objects for ${entity} under ${bucket}/${prefix}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        bucket,
        prefix,
        error instanceof Error ? error : undefined
      );
    }

    this.options.onCycleComplete?.(summary);
    return summary;
  }

  private async loadProcessedObjects(): Promise<ReadonlySet<string>> {
    try {
      return new Set(await this.oracle.processedObjects());
    } catch (error) {
      console.error('Failed to load processed objects, continuing without dedup for this cycle', {
        entity: entityIdentifier(this.entity),
        error
      });
      return new Set();
    }
  }
}
