/**
 * Poller configuration from environment variables
 */

import dotenv from 'dotenv';
import * as os from 'os';
import * as path from 'path';

export interface LoadBalancerSourceConfig {
  bucket: string;
  prefix: string;
  names: string[];
}

export interface DistributionSourceConfig {
  bucket: string;
  prefix: string;
  distributionIds: string[];
}

export interface PollerConfig {
  region?: string;
  pollIntervalMs: number;
  backfillWindowMs: number;
  tempDirectory: string;
  tempFilePrefix: string;
  keepDownloadedFiles: boolean;
  loadBalancers: LoadBalancerSourceConfig | null;
  distributions: DistributionSourceConfig | null;
}

export class ConfigurationError extends Error {
  public code = 'CONFIGURATION_ERROR';

  constructor(message: string, public variable?: string, public originalError?: Error) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

type Environment = Record<string, string | undefined>;

// Largest delay a Node.js timer accepts
export const MAX_POLL_INTERVAL_MS = 2 ** 31 - 1;

/**
 * Load .env.local (highest priority) and then .env into process.env
 */
export function loadEnvironment(directory = process.cwd()): void {
  dotenv.config({ path: path.join(directory, '.env.local'), override: true });
  dotenv.config({ path: path.join(directory, '.env') });
}

function parseMinutes(env: Environment, variable: string, fallback: number, maxMs = Infinity): number {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') {
    return fallback * 60 * 1000;
  }

  const minutes = Number(raw);
  if (!Number.isFinite(minutes) || minutes <= 0) {
    throw new ConfigurationError(`${variable} must be a positive number of minutes, got "${raw}"`, variable);
  }

  const ms = minutes * 60 * 1000;
  if (ms > maxMs) {
    throw new ConfigurationError(
      `${variable} must be at most ${Math.floor(maxMs / 60000)} minutes, got "${raw}"`,
      variable
    );
  }
  return ms;
}

function parseList(raw: string | undefined): string[] {
  return (raw || '')
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

function parseBoolean(raw: string | undefined): boolean {
  return ['1', 'true', 'yes'].includes((raw || '').trim().toLowerCase());
}

function requireBucket(env: Environment, variable: string, listVariable: string): string {
  const bucket = (env[variable] || '').trim();
  if (!bucket) {
    throw new ConfigurationError(`${variable} is required when ${listVariable} is set`, variable);
  }
  return bucket;
}

export function getPollerConfig(env: Environment = process.env): PollerConfig {
  const lbNames = parseList(env.ELB_NAMES);
  const distributionIds = parseList(env.CLOUDFRONT_DISTRIBUTION_IDS);

  const loadBalancers = lbNames.length > 0
    ? {
      bucket: requireBucket(env, 'ELB_LOG_BUCKET', 'ELB_NAMES'),
      prefix: (env.ELB_LOG_PREFIX || '').trim(),
      names: lbNames
    }
    : null;

  const distributions = distributionIds.length > 0
    ? {
      bucket: requireBucket(env, 'CLOUDFRONT_LOG_BUCKET', 'CLOUDFRONT_DISTRIBUTION_IDS'),
      prefix: (env.CLOUDFRONT_LOG_PREFIX || '').trim(),
      distributionIds
    }
    : null;

  if (!loadBalancers && !distributions) {
    throw new ConfigurationError('No log sources configured: set ELB_NAMES or CLOUDFRONT_DISTRIBUTION_IDS');
  }

  return {
    region: env.AWS_REGION?.trim() || undefined,
    pollIntervalMs: parseMinutes(env, 'LOG_POLL_INTERVAL_MINUTES', 5, MAX_POLL_INTERVAL_MS),
    backfillWindowMs: parseMinutes(env, 'LOG_BACKFILL_MINUTES', 60),
    tempDirectory: env.LOG_TEMP_DIRECTORY?.trim() || os.tmpdir(),
    tempFilePrefix: env.LOG_TEMP_FILE_PREFIX?.trim() || 'entity-ingest',
    keepDownloadedFiles: parseBoolean(env.KEEP_DOWNLOADED_FILES),
    loadBalancers,
    distributions
  };
}
