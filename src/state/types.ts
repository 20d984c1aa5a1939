/**
 * Source of truth for which object keys have already been retrieved for an entity.
 * Implementations own persistence; the pipeline only reads.
 */
export interface ProcessedObjectOracle {
  processedObjects(): Promise<string[]>;
}

export interface ProcessedObjectStore extends ProcessedObjectOracle {
  markProcessed(key: string): Promise<void>;
}
