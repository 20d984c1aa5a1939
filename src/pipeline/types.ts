// Types for the discovery/download pipeline

import type { S3Object } from '../s3/types';

export type CandidateObject = S3Object;

export interface DownloadedObject {
  path: string;
  key: string;
  bytes: number;
  downloadedAt: Date;
}

export interface CycleSummary {
  entity: string;
  prefix: string;
  startedAt: Date;
  pages: number;
  listed: number;
  forwarded: number;
  expired: number;
  stoppedAt?: string; // first already-processed key met, if any
}

export interface PageFilterResult {
  candidates: CandidateObject[];
  expired: number;
  stoppedAt?: string;
}

export interface PipelineConfig {
  pollIntervalMs: number;
  backfillWindowMs: number;
  tempDirectory: string;
  tempFilePrefix: string;
  now: () => Date;
}

export class PipelineError extends Error {
  constructor(
    message: string,
    public code?: string,
    public originalError?: Error
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

export class ListingError extends PipelineError {
  constructor(message: string, public bucket: string, public prefix: string, originalError?: Error) {
    super(message, 'LISTING_ERROR', originalError);
    this.name = 'ListingError';
  }
}

export class DownloadError extends PipelineError {
  constructor(message: string, public bucket: string, public key: string, originalError?: Error) {
    super(message, 'DOWNLOAD_ERROR', originalError);
    this.name = 'DownloadError';
  }
}

export class ChannelClosedError extends PipelineError {
  constructor(message = 'Channel is closed') {
    super(message, 'CHANNEL_CLOSED');
    this.name = 'ChannelClosedError';
  }
}
