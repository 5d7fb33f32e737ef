/**
 * S3 Manager
 * Listing, metadata, upload and restore operations for archival-tier objects
 */

import { readFile } from 'node:fs/promises';

import {
  S3Client,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  RestoreObjectCommand,
} from '@aws-sdk/client-s3';

import { formatErrorMessage } from '../utils/errors.js';
import type {
  S3ClientConfig,
  S3OperationResult,
  S3Object,
  S3ObjectDetails,
  S3ListObjectsOptions,
  S3ListObjectsResult,
  S3UploadFileOptions,
  S3RestoreObjectOptions,
} from './types.js';

// ============================================================================
// S3 Manager Class
// ============================================================================

export class S3Manager {
  private config: S3ClientConfig;
  private defaultRegion: string;
  private clients = new Map<string, S3Client>();

  constructor(config: S3ClientConfig = {}) {
    this.config = config;
    this.defaultRegion = config.region || process.env.AWS_REGION || 'us-east-1';
  }

  get region(): string {
    return this.defaultRegion;
  }

  // --------------------------------------------------------------------------
  // Client Factory Methods
  // --------------------------------------------------------------------------

  // Pooled workers share one client per region so they share its connection pool.
  private getS3Client(region?: string): S3Client {
    const resolved = region || this.defaultRegion;
    let client = this.clients.get(resolved);
    if (!client) {
      client = new S3Client({
        region: resolved,
        credentials: this.config.credentials,
      });
      this.clients.set(resolved, client);
    }
    return client;
  }

  // ==========================================================================
  // 1. Listing
  // ==========================================================================

  /**
   * List one page of objects in a bucket
   */
  async listObjects(options: S3ListObjectsOptions): Promise<S3ListObjectsResult> {
    const client = this.getS3Client(options.region);

    const command = new ListObjectsV2Command({
      Bucket: options.bucketName,
      Prefix: options.prefix,
      ContinuationToken: options.continuationToken,
    });

    const response = await client.send(command);

    return {
      objects: (response.Contents || []).map((obj) => ({
        key: obj.Key || '',
        lastModified: obj.LastModified,
        eTag: obj.ETag,
        size: obj.Size ?? 0,
        storageClass: obj.StorageClass,
      })),
      isTruncated: response.IsTruncated,
      nextContinuationToken: response.NextContinuationToken,
      keyCount: response.KeyCount,
    };
  }

  /**
   * List every object under a prefix, following continuation tokens
   */
  async listAllObjects(options: Omit<S3ListObjectsOptions, 'continuationToken'>): Promise<S3Object[]> {
    const objects: S3Object[] = [];
    let continuationToken: string | undefined;

    do {
      const page = await this.listObjects({ ...options, continuationToken });
      objects.push(...page.objects);
      continuationToken = page.isTruncated ? page.nextContinuationToken : undefined;
    } while (continuationToken);

    return objects;
  }

  // ==========================================================================
  // 2. Object Metadata
  // ==========================================================================

  /**
   * Get object metadata without downloading. Errors propagate to the caller,
   * which decides how a failed lookup is classified.
   */
  async getObjectMetadata(bucketName: string, key: string, region?: string): Promise<S3ObjectDetails> {
    const client = this.getS3Client(region);

    const response = await client.send(
      new HeadObjectCommand({
        Bucket: bucketName,
        Key: key,
      }),
    );

    return {
      key,
      lastModified: response.LastModified,
      eTag: response.ETag,
      size: response.ContentLength ?? 0,
      storageClass: response.StorageClass,
      contentType: response.ContentType,
      restore: response.Restore,
      versionId: response.VersionId,
    };
  }

  // ==========================================================================
  // 3. Upload
  // ==========================================================================

  /**
   * Upload a local file, optionally straight into an archival storage class
   */
  async uploadFile(options: S3UploadFileOptions): Promise<S3OperationResult> {
    const client = this.getS3Client(options.region);

    try {
      const body = await readFile(options.filePath);
      const response = await client.send(
        new PutObjectCommand({
          Bucket: options.bucketName,
          Key: options.key,
          Body: body,
          ContentType: options.contentType,
          StorageClass: options.storageClass,
        }),
      );

      return {
        success: true,
        message: `Object '${options.key}' uploaded to '${options.bucketName}'`,
        data: {
          eTag: response.ETag,
          versionId: response.VersionId,
        },
      };
    } catch (error) {
      return {
        success: false,
        message: `Failed to upload '${options.key}'`,
        error: formatErrorMessage(error),
      };
    }
  }

  // ==========================================================================
  // 4. Restore
  // ==========================================================================

  /**
   * Initiate a restore of an archived object. Rejections (tier unavailable,
   * already in progress, not restorable) are thrown as SDK service exceptions.
   */
  async restoreObject(options: S3RestoreObjectOptions): Promise<void> {
    const client = this.getS3Client(options.region);

    await client.send(
      new RestoreObjectCommand({
        Bucket: options.bucketName,
        Key: options.key,
        RestoreRequest: {
          Days: options.days,
          GlacierJobParameters: { Tier: options.tier },
        },
      }),
    );
  }
}

export function createS3Manager(config?: S3ClientConfig): S3Manager {
  return new S3Manager(config);
}
