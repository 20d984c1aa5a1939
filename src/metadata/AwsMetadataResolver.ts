import AWS from 'aws-sdk';
import { EntityMetadata, EntityMetadataResolver, MetadataResolutionError } from './types';

const REGION_METADATA_PATH = '/latest/meta-data/placement/region';

export interface AwsMetadataResolverOptions {
  region?: string;
  metadataTimeoutMs?: number;
}

/**
 * Resolves the account id through STS and the region from configuration,
 * falling back to the EC2 instance metadata service when no region is configured.
 */
export class AwsMetadataResolver implements EntityMetadataResolver {
  private sts: AWS.STS;
  private metadataService: AWS.MetadataService;
  private configuredRegion?: string;
  private cached: Promise<EntityMetadata> | null = null;

  constructor(options: AwsMetadataResolverOptions = {}) {
    this.configuredRegion = options.region;
    this.sts = new AWS.STS({ region: options.region });
    this.metadataService = new AWS.MetadataService({
      httpOptions: { timeout: options.metadataTimeoutMs ?? 1000 }
    });
  }

  resolve(): Promise<EntityMetadata> {
    if (!this.cached) {
      this.cached = this.lookup().catch((error) => {
        this.cached = null;
        throw error;
      });
    }
    return this.cached;
  }

  private async lookup(): Promise<EntityMetadata> {
    const [accountId, region] = await Promise.all([this.lookupAccountId(), this.lookupRegion()]);
    console.log('Resolved AWS metadata', { accountId, region });
    return { accountId, region };
  }

  private async lookupAccountId(): Promise<string> {
    try {
      const identity = await this.sts.getCallerIdentity({}).promise();
      if (!identity.Account) {
        throw new Error('caller identity has no account');
      }
      return identity.Account;
    } catch (error) {
      throw new MetadataResolutionError(
        `Failed to resolve AWS account id: ${error instanceof Error ? error.message : 'Unknown error'}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  private async lookupRegion(): Promise<string> {
    if (this.configuredRegion) {
      return this.configuredRegion;
    }

    try {
      const region = await new Promise<string>((resolve, reject) => {
        this.metadataService.request(REGION_METADATA_PATH, (err, data) => {
          if (err) {
            reject(err);
          } else {
            resolve(data.trim());
          }
        });
      });
      if (!region) {
        throw new Error('instance metadata returned an empty region');
      }
      return region;
    } catch (error) {
      throw new MetadataResolutionError(
        `Failed to resolve AWS region: ${error instanceof Error ? error.message : 'Unknown error'}`,
        error instanceof Error ? error : undefined
      );
    }
  }
}
