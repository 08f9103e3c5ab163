/**
 * MinIO Uploader
 * 
 * S3-compatible object storage upload via MinIO client.
 */

import { Client } from 'minio';
import { lookup as lookupMimeType } from 'mime-types';
import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import type { RemoteUploader, RemoteUploadOptions, RemoteUploadResult } from '../types.js';

export interface MinioConfig {
  endPoint: string;
  port: number;
  useSSL: boolean;
  accessKey: string;
  secretKey: string;
  bucket: string;
}

export class MinioUploader implements RemoteUploader {
  private client: Client;
  private bucket: string;

  constructor(config: MinioConfig) {
    this.client = new Client({
      endPoint: config.endPoint,
      port: config.port,
      useSSL: config.useSSL,
      accessKey: config.accessKey,
      secretKey: config.secretKey,
    });
    this.bucket = config.bucket;
  }

  /**
   * Ensure the bucket exists
   */
  async ensureBucket(): Promise<void> {
    const exists = await this.client.bucketExists(this.bucket);
    if (!exists) {
      await this.client.makeBucket(this.bucket);
    }
  }

  /**
   * Upload a file to MinIO under the given key
   */
  async upload(
    filePath: string,
    remoteKey: string,
    options: RemoteUploadOptions
  ): Promise<RemoteUploadResult> {
    if (!options.overwrite && await this.objectExists(remoteKey)) {
      throw new Error(`Object already exists: ${remoteKey}`);
    }

    const fileStat = await stat(filePath);
    const stream = createReadStream(filePath);

    const result = await this.client.putObject(
      this.bucket,
      remoteKey,
      stream,
      fileStat.size,
      {
        'Content-Type': lookupMimeType(remoteKey) || 'application/octet-stream',
      }
    );

    return {
      key: remoteKey,
      etag: result.etag,
    };
  }

  /**
   * Check if MinIO is accessible
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.client.listBuckets();
      return true;
    } catch {
      return false;
    }
  }

  private async objectExists(key: string): Promise<boolean> {
    try {
      await this.client.statObject(this.bucket, key);
      return true;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'NotFound') {
        return false;
      }
      throw error;
    }
  }
}
