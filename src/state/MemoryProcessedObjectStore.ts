import { ProcessedObjectStore } from './types';

/**
 * Keeps processed keys for one entity in memory, oldest evicted first once
 * `maxKeys` is reached. Nothing survives a restart.
 */
export class MemoryProcessedObjectStore implements ProcessedObjectStore {
  private keys = new Set<string>();
  private maxKeys: number;

  constructor(maxKeys = 10000) {
    if (!Number.isInteger(maxKeys) || maxKeys <= 0) {
      throw new Error(`maxKeys must be a positive integer, got ${maxKeys}`);
    }
    this.maxKeys = maxKeys;
  }

  async processedObjects(): Promise<string[]> {
    return Array.from(this.keys);
  }

  async markProcessed(key: string): Promise<void> {
    // Re-marking moves the key to the newest position
    this.keys.delete(key);
    this.keys.add(key);

    while (this.keys.size > this.maxKeys) {
      const oldest = this.keys.values().next();
      if (oldest.done) break;
      this.keys.delete(oldest.value);
    }
  }

  get size(): number {
    return this.keys.size;
  }
}
