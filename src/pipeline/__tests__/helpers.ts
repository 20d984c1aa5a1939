import { Readable } from 'stream';
import { ObjectPageCallback, ObjectStoreClient, S3Object } from '../../s3/types';
import { ProcessedObjectOracle } from '../../state/types';

export const NOW = new Date('2024-03-05T12:00:00Z');

export const minutes = (count: number): number => count * 60 * 1000;

export function objectAged(key: string, ageMs: number, size = 128): S3Object {
  return { key, size, lastModified: new Date(NOW.getTime() - ageMs) };
}

/**
 * Object store double serving fixed listing pages and object bodies from memory
 */
export class InMemoryObjectStore implements ObjectStoreClient {
  pages: S3Object[][] = [];
  bodies = new Map<string, string | Error>();
  // Keys whose body starts streaming but never ends
  stalled = new Set<string>();
  listError: Error | null = null;
  listCalls: Array<{ bucket: string; prefix: string }> = [];
  pagesServed = 0;
  activeStreams = 0;
  maxActiveStreams = 0;

  async listObjectPages(bucket: string, prefix: string, onPage: ObjectPageCallback): Promise<void> {
    this.listCalls.push({ bucket, prefix });
    if (this.listError) {
      throw this.listError;
    }

    for (let i = 0; i < this.pages.length; i++) {
      this.pagesServed++;
      const keepPaging = await onPage({ objects: this.pages[i], lastPage: i === this.pages.length - 1 });
      if (!keepPaging) {
        break;
      }
    }
  }

  getObjectStream(_bucket: string, key: string): Readable {
    if (this.stalled.has(key)) {
      const stream = new Readable({ read() {} });
      stream.push(Buffer.from('partial body'));
      return stream;
    }

    const body = this.bodies.get(key);
    if (body === undefined || body instanceof Error) {
      const failure = body ?? new Error(`NoSuchKey: ${key}`);
      return new Readable({
        read() {
          this.destroy(failure);
        }
      });
    }

    this.activeStreams++;
    this.maxActiveStreams = Math.max(this.maxActiveStreams, this.activeStreams);
    const stream = Readable.from([Buffer.from(body)]);
    stream.once('end', () => {
      this.activeStreams--;
    });
    return stream;
  }
}

export class StaticOracle implements ProcessedObjectOracle {
  constructor(private keys: string[] = [], private error: Error | null = null) {}

  async processedObjects(): Promise<string[]> {
    if (this.error) {
      throw this.error;
    }
    return this.keys;
  }
}

export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const startedAt = Date.now();
  while (!condition()) {
    if (Date.now() - startedAt > timeoutMs) {
      throw new Error('Timed out waiting for condition');
    }
    await new Promise(resolve => setTimeout(resolve, 5));
  }
}
