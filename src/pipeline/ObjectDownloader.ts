import { createWriteStream } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { pipeline } from 'stream/promises';
import { v4 as uuidv4 } from 'uuid';
import { entityBucket, entityIdentifier } from '../entities/EntityDescriptor';
import { EntityDescriptor } from '../entities/types';
import { ObjectStoreClient } from '../s3/types';
import { Channel } from './Channel';
import {
  CandidateObject,
  ChannelClosedError,
  DownloadError,
  DownloadedObject,
  PipelineConfig
} from './types';

export interface ObjectDownloaderOptions extends Pick<PipelineConfig, 'tempDirectory' | 'tempFilePrefix' | 'now'> {
  onError?: (error: DownloadError) => void;
}

export class ObjectDownloader {
  private store: ObjectStoreClient;
  private entity: EntityDescriptor;
  private candidates: Channel<CandidateObject>;
  private output: Channel<DownloadedObject>;
  private options: ObjectDownloaderOptions;

  constructor(
    store: ObjectStoreClient,
    entity: EntityDescriptor,
    candidates: Channel<CandidateObject>,
    output: Channel<DownloadedObject>,
    options: ObjectDownloaderOptions
  ) {
    this.store = store;
    this.entity = entity;
    this.candidates = candidates;
    this.output = output;
    this.options = options;
  }

  /**
   * Download candidates one at a time until the candidate channel closes.
   * Failed downloads are logged and dropped.
   */
  async run(signal: AbortSignal): Promise<void> {
    for await (const candidate of this.candidates) {
      let downloaded: DownloadedObject;
      try {
        downloaded = await this.downloadObject(candidate, signal);
      } catch (error) {
        if (signal.aborted) {
          return;
        }
        const downloadError = error instanceof DownloadError
          ? error
          : new DownloadError(
            `Failed to download object ${candidate.key}: ${error instanceof Error ? error.message : 'Unknown error'}`,
            entityBucket(this.entity),
            candidate.key,
            error instanceof Error ? error : undefined
          );
        console.error(downloadError.message, {
          entity: entityIdentifier(this.entity),
          bucket: downloadError.bucket,
          key: downloadError.key
        });
        this.options.onError?.(downloadError);
        continue;
      }

      try {
        await this.output.send(downloaded);
      } catch (error) {
        if (!(error instanceof ChannelClosedError)) {
          throw error;
        }
        // Nobody will take ownership of the file any more
        await this.removeFile(downloaded.path);
        return;
      }
    }
  }

  /**
   * Fetch one object into a new temporary file
   */
  async downloadObject(candidate: CandidateObject, signal?: AbortSignal): Promise<DownloadedObject> {
    const bucket = entityBucket(this.entity);
    const entity = entityIdentifier(this.entity);

    console.log('Downloading access logs from object', {
      key: candidate.key,
      size: candidate.size,
      fromTimeAgoMs: this.options.now().getTime() - candidate.lastModified.getTime(),
      entity
    });

    const filePath = path.join(this.options.tempDirectory, `${this.options.tempFilePrefix}-${uuidv4()}`);

    try {
      await fs.mkdir(this.options.tempDirectory, { recursive: true });
    } catch (error) {
      throw new DownloadError(
        `Failed to create tmp file for ${candidate.key}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        bucket,
        candidate.key,
        error instanceof Error ? error : undefined
      );
    }

    let bytes = 0;
    try {
      const source = this.store.getObjectStream(bucket, candidate.key, signal);
      // 'wx' fails rather than reuse an existing file
      const writeStream = createWriteStream(filePath, { flags: 'wx' });
      await pipeline(source, writeStream, { signal });
      bytes = writeStream.bytesWritten;
    } catch (error) {
      await this.removeFile(filePath);
      throw new DownloadError(
        `Failed to download object ${candidate.key} from bucket ${bucket}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        bucket,
        candidate.key,
        error instanceof Error ? error : undefined
      );
    }

    const downloaded: DownloadedObject = {
      path: filePath,
      key: candidate.key,
      bytes,
      downloadedAt: this.options.now()
    };

    console.log('Successfully downloaded object', {
      bytes: downloaded.bytes,
      file: downloaded.path,
      entity
    });

    return downloaded;
  }

  private async removeFile(filePath: string): Promise<void> {
    try {
      await fs.rm(filePath, { force: true });
    } catch (error) {
      console.error(`Failed to remove ${filePath}:`, error);
    }
  }
}
