import type { Readable } from 'stream';

export interface S3Object {
  key: string;
  size: number;
  lastModified: Date;
}

export interface ObjectPage {
  objects: S3Object[];
  lastPage: boolean;
}

/**
 * Called once per listing page. Resolve to `false` to stop paging.
 */
export type ObjectPageCallback = (page: ObjectPage) => boolean | Promise<boolean>;

export interface ObjectStoreClient {
  listObjectPages(
    bucketName: string,
    prefix: string,
    onPage: ObjectPageCallback,
    signal?: AbortSignal
  ): Promise<void>;
  getObjectStream(bucketName: string, key: string, signal?: AbortSignal): Readable;
}

export interface S3ClientOptions {
  region?: string;
  timeoutMs?: number;
  pageSize?: number;
}
