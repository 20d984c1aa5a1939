import AWS from 'aws-sdk';
import type { Readable } from 'stream';
import { ObjectPageCallback, ObjectStoreClient, S3ClientOptions, S3Object } from './types';

export function createS3Client(options: S3ClientOptions = {}): AWS.S3 {
  return new AWS.S3({
    region: options.region,
    httpOptions: {
      timeout: options.timeoutMs ?? 30000, // 30 second timeout for individual AWS calls
    },
  });
}

/**
 * Abort an in-flight SDK request when the signal fires
 */
function abortOnSignal(request: { abort(): void }, signal?: AbortSignal): () => void {
  if (!signal) {
    return () => undefined;
  }
  const onAbort = () => request.abort();
  signal.addEventListener('abort', onAbort, { once: true });
  return () => signal.removeEventListener('abort', onAbort);
}

export class S3ObjectStore implements ObjectStoreClient {
  private s3: AWS.S3;
  private pageSize?: number;

  constructor(s3: AWS.S3, options: Pick<S3ClientOptions, 'pageSize'> = {}) {
    this.s3 = s3;
    this.pageSize = options.pageSize;
  }

  async listObjectPages(
    bucketName: string,
    prefix: string,
    onPage: ObjectPageCallback,
    signal?: AbortSignal
  ): Promise<void> {
    let continuationToken: string | undefined;

    do {
      const params: AWS.S3.ListObjectsV2Request = {
        Bucket: bucketName,
        Prefix: prefix,
        ContinuationToken: continuationToken,
        MaxKeys: this.pageSize,
      };

      let result: AWS.S3.ListObjectsV2Output;
      const request = this.s3.listObjectsV2(params);
      const detach = abortOnSignal(request, signal);
      try {
        result = await request.promise();
      } catch (error) {
        throw new Error(`Failed to list objects in bucket ${bucketName}: ${error instanceof Error ? error.message : 'Unknown error'}`);
      } finally {
        detach();
      }

      continuationToken = result.NextContinuationToken;

      const objects: S3Object[] = [];
      for (const obj of result.Contents || []) {
        if (obj.Key && obj.LastModified) {
          objects.push({ key: obj.Key, size: obj.Size ?? 0, lastModified: obj.LastModified });
        }
      }

      // Page callbacks may throw their own errors; those propagate unwrapped
      const keepPaging = await onPage({ objects, lastPage: !continuationToken });
      if (!keepPaging) {
        break;
      }
    } while (continuationToken);
  }

  getObjectStream(bucketName: string, key: string, signal?: AbortSignal): Readable {
    const params: AWS.S3.GetObjectRequest = {
      Bucket: bucketName,
      Key: key,
    };

    const request = this.s3.getObject(params);
    const stream = request.createReadStream();
    const detach = abortOnSignal(request, signal);
    stream.once('close', detach);
    return stream;
  }
}
