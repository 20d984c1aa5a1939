import * as fs from 'fs/promises';
import { PollerConfig } from '../config';
import { createCdnEntity, createLoadBalancerEntity, entityIdentifier } from '../entities/EntityDescriptor';
import { EntityDescriptor } from '../entities/types';
import { EntityMetadataResolver } from '../metadata/types';
import { PipelineCoordinator } from '../pipeline/PipelineCoordinator';
import { CycleSummary, DownloadedObject } from '../pipeline/types';
import { ObjectStoreClient } from '../s3/types';
import { MemoryProcessedObjectStore } from '../state/MemoryProcessedObjectStore';
import { ProcessedObjectStore } from '../state/types';

export interface LogPollerDependencies {
  objectStore: ObjectStoreClient;
  metadataResolver: EntityMetadataResolver;
  createStateStore?: (entity: EntityDescriptor) => ProcessedObjectStore;
  now?: () => Date;
}

interface EntityPipeline {
  entity: EntityDescriptor;
  state: ProcessedObjectStore;
  coordinator: PipelineCoordinator;
}

/**
 * Build one descriptor per configured load balancer and distribution.
 * Account metadata is only looked up when load balancers are configured.
 */
export async function buildEntities(
  config: PollerConfig,
  resolver: EntityMetadataResolver
): Promise<EntityDescriptor[]> {
  const entities: EntityDescriptor[] = [];

  if (config.loadBalancers) {
    const { bucket, prefix, names } = config.loadBalancers;
    for (const loadBalancerName of names) {
      entities.push(await createLoadBalancerEntity({ bucket, prefix, loadBalancerName }, resolver));
    }
  }

  if (config.distributions) {
    const { bucket, prefix, distributionIds } = config.distributions;
    for (const distributionId of distributionIds) {
      entities.push(createCdnEntity({ bucket, prefix, distributionId }));
    }
  }

  return entities;
}

/**
 * Runs a pipeline per entity and consumes what they download: each object is
 * marked processed and its temporary file removed unless configured to keep it.
 */
export class LogPoller {
  private config: PollerConfig;
  private deps: LogPollerDependencies;
  private pipelines: EntityPipeline[] = [];
  private stopped = false;

  constructor(config: PollerConfig, deps: LogPollerDependencies) {
    this.config = config;
    this.deps = deps;
  }

  /**
   * Resolves once every pipeline has been stopped; rejects with the first fatal pipeline error
   */
  async run(): Promise<void> {
    const entities = await buildEntities(this.config, this.deps.metadataResolver);
    if (this.stopped) {
      return;
    }

    const createStateStore = this.deps.createStateStore ?? (() => new MemoryProcessedObjectStore());

    this.pipelines = entities.map(entity => {
      const state = createStateStore(entity);
      const coordinator = new PipelineCoordinator(this.deps.objectStore, state, entity, {
        pollIntervalMs: this.config.pollIntervalMs,
        backfillWindowMs: this.config.backfillWindowMs,
        tempDirectory: this.config.tempDirectory,
        tempFilePrefix: this.config.tempFilePrefix,
        ...(this.deps.now ? { now: this.deps.now } : {})
      });
      return { entity, state, coordinator };
    });

    console.log(`Polling ${this.pipelines.length} log source(s)`, {
      entities: entities.map(entityIdentifier)
    });

    await Promise.all(this.pipelines.map(pipeline => this.consume(pipeline)));
  }

  async stop(): Promise<void> {
    this.stopped = true;
    await Promise.all(this.pipelines.map(pipeline => pipeline.coordinator.stop()));
  }

  private async consume(pipeline: EntityPipeline): Promise<void> {
    const { coordinator } = pipeline;

    coordinator.on('cycleComplete', (summary: CycleSummary) => {
      console.log('Finished polling cycle', summary);
    });

    for await (const downloaded of coordinator.start()) {
      await this.handleDownloaded(pipeline, downloaded);
    }
  }

  private async handleDownloaded(pipeline: EntityPipeline, downloaded: DownloadedObject): Promise<void> {
    const entity = entityIdentifier(pipeline.entity);
    console.log('Received log object', { entity, key: downloaded.key, file: downloaded.path, bytes: downloaded.bytes });

    try {
      await pipeline.state.markProcessed(downloaded.key);
    } catch (error) {
      console.error('Failed to mark object as processed', { entity, key: downloaded.key, error });
    }

    if (!this.config.keepDownloadedFiles) {
      try {
        await fs.rm(downloaded.path, { force: true });
      } catch (error) {
        console.error(`Failed to remove ${downloaded.path}:`, error);
      }
    }
  }
}
