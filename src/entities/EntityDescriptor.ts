import { EntityMetadata, EntityMetadataResolver, MetadataResolutionError } from '../metadata/types';
import {
  AWS_ELASTIC_LOAD_BALANCING,
  CdnEntity,
  CdnEntityOptions,
  EntityDescriptor,
  LoadBalancerEntity,
  LoadBalancerEntityOptions
} from './types';

const pad = (value: number): string => value.toString().padStart(2, '0');

/**
 * Split a day into zero-padded UTC date parts
 */
function utcDateParts(day: Date): { year: string; month: string; date: string } {
  return {
    year: day.getUTCFullYear().toString(),
    month: pad(day.getUTCMonth() + 1),
    date: pad(day.getUTCDate())
  };
}

function withRoot(root: string, path: string): string {
  const trimmed = root.replace(/\/+$/, '');
  return trimmed ? `${trimmed}/${path}` : path;
}

export function entityBucket(entity: EntityDescriptor): string {
  return entity.bucket;
}

/**
 * Key prefix under which the provider delivers the entity's logs for one UTC day.
 * These formats follow the S3 log delivery naming of each service and must stay exact.
 */
export function objectPrefix(entity: EntityDescriptor, day: Date): string {
  const { year, month, date } = utcDateParts(day);

  switch (entity.kind) {
    case 'load-balancer': {
      const { accountId, region, loadBalancerName } = entity;
      return withRoot(
        entity.prefix,
        `AWSLogs/${accountId}/${AWS_ELASTIC_LOAD_BALANCING}/${region}/${year}/${month}/${date}` +
          `/${accountId}_${AWS_ELASTIC_LOAD_BALANCING}_${region}_${loadBalancerName}`
      );
    }
    case 'cdn':
      return withRoot(entity.prefix, `${entity.distributionId}.${year}-${month}-${date}`);
    default: {
      const unknown: never = entity;
      throw new Error(`Unsupported entity: ${JSON.stringify(unknown)}`);
    }
  }
}

export function entityIdentifier(entity: EntityDescriptor): string {
  switch (entity.kind) {
    case 'load-balancer':
      return entity.loadBalancerName;
    case 'cdn':
      return entity.distributionId;
    default: {
      const unknown: never = entity;
      throw new Error(`Unsupported entity: ${JSON.stringify(unknown)}`);
    }
  }
}

export function createCdnEntity(options: CdnEntityOptions): CdnEntity {
  const entity: CdnEntity = {
    kind: 'cdn',
    bucket: options.bucket,
    prefix: options.prefix,
    distributionId: options.distributionId
  };
  return Object.freeze(entity);
}

/**
 * Build a load balancer entity, looking up the account id and region once.
 * Fails instead of returning a descriptor with missing identifiers.
 */
export async function createLoadBalancerEntity(
  options: LoadBalancerEntityOptions,
  resolver: EntityMetadataResolver
): Promise<LoadBalancerEntity> {
  let metadata: EntityMetadata;
  try {
    metadata = await resolver.resolve();
  } catch (error) {
    if (error instanceof MetadataResolutionError) {
      throw error;
    }
    throw new MetadataResolutionError(
      `Failed to resolve metadata for load balancer ${options.loadBalancerName}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      error instanceof Error ? error : undefined
    );
  }

  if (!metadata.accountId || !metadata.region) {
    throw new MetadataResolutionError(
      `Failed to resolve metadata for load balancer ${options.loadBalancerName}: account id and region are required`
    );
  }

  const entity: LoadBalancerEntity = {
    kind: 'load-balancer',
    bucket: options.bucket,
    prefix: options.prefix,
    accountId: metadata.accountId,
    region: metadata.region,
    loadBalancerName: options.loadBalancerName
  };
  return Object.freeze(entity);
}
