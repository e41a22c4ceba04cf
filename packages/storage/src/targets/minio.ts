/**
 * MinIO Blob Store
 * 
 * S3-compatible object storage via the MinIO client. Clients stream from
 * presigned URLs; nothing is kept locally.
 */

import { Client } from 'minio';
import type { BlobStore } from '@reelvault/core';
import { errorMessage, isErrnoException } from '@reelvault/utils';
import { logger } from '../logger.js';

export interface MinioConfig {
  endPoint: string;
  port: number;
  useSSL: boolean;
  accessKey: string;
  secretKey: string;
  bucket: string;
  /** Key prefix inside the bucket, e.g. "videos" */
  prefix?: string;
}

const NOT_FOUND_CODES = new Set(['NotFound', 'NoSuchKey']);

function isNotFound(error: unknown): boolean {
  return isErrnoException(error) && error.code !== undefined && NOT_FOUND_CODES.has(error.code);
}

export class MinioBlobStore implements BlobStore {
  readonly name = 'minio';
  private client: Client;
  private bucket: string;
  private prefix: string;

  constructor(config: MinioConfig, client?: Client) {
    this.client = client ?? new Client({
      endPoint: config.endPoint,
      port: config.port,
      useSSL: config.useSSL,
      accessKey: config.accessKey,
      secretKey: config.secretKey,
    });
    this.bucket = config.bucket;
    this.prefix = config.prefix ? `${config.prefix.replace(/\/+$/, '')}/` : '';
  }

  /**
   * Ensure the bucket exists
   */
  async ensureBucket(): Promise<void> {
    const exists = await this.client.bucketExists(this.bucket);
    if (!exists) {
      await this.client.makeBucket(this.bucket);
      logger.info({ bucket: this.bucket }, 'Bucket created');
    }
  }

  async put(storageKey: string, localPath: string): Promise<void> {
    await this.client.fPutObject(this.bucket, this.objectName(storageKey), localPath, {
      'Content-Type': this.getMimeType(storageKey),
    });
    logger.info({ bucket: this.bucket, storageKey }, 'Blob uploaded');
  }

  async delete(storageKey: string): Promise<void> {
    await this.client.removeObject(this.bucket, this.objectName(storageKey));
  }

  async exists(storageKey: string): Promise<boolean> {
    return (await this.size(storageKey)) !== null;
  }

  async size(storageKey: string): Promise<number | null> {
    try {
      const stat = await this.client.statObject(this.bucket, this.objectName(storageKey));
      return stat.size;
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async urlFor(storageKey: string, ttlSeconds: number): Promise<string | null> {
    if (!(await this.exists(storageKey))) {
      return null;
    }
    return this.client.presignedGetObject(this.bucket, this.objectName(storageKey), ttlSeconds);
  }

  async localPath(): Promise<string | null> {
    return null;
  }

  /**
   * Check if MinIO is accessible
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.client.bucketExists(this.bucket);
      return true;
    } catch (error) {
      logger.warn({ bucket: this.bucket, error: errorMessage(error) }, 'MinIO unreachable');
      return false;
    }
  }

  private objectName(storageKey: string): string {
    return `${this.prefix}${storageKey}`;
  }

  private getMimeType(filename: string): string {
    const ext = filename.split('.').pop()?.toLowerCase();
    const mimeTypes: Record<string, string> = {
      'mp4': 'video/mp4',
      'mkv': 'video/x-matroska',
      'webm': 'video/webm',
    };
    return mimeTypes[ext ?? ''] ?? 'application/octet-stream';
  }
}
