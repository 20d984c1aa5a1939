export interface EntityMetadata {
  accountId: string;
  region: string;
}

export interface EntityMetadataResolver {
  resolve(): Promise<EntityMetadata>;
}

export class MetadataResolutionError extends Error {
  public code = 'METADATA_RESOLUTION_ERROR';

  constructor(message: string, public originalError?: Error) {
    super(message);
    this.name = 'MetadataResolutionError';
  }
}
