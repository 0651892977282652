import { S3Client, PutObjectCommand } from '@aws-sdk/client-s3';
import type { R2Settings } from '../config/env.js';
import { getLogger } from '../lib/logger.js';

let _s3: S3Client | null = null;

export function createR2Client(settings: R2Settings): S3Client {
  if (_s3) return _s3;

  _s3 = new S3Client({
    region: 'auto',
    endpoint: settings.endpoint,
    credentials: {
      accessKeyId: settings.accessKeyId,
      secretAccessKey: settings.secretAccessKey,
    },
  });

  getLogger().info('R2 client initialized');
  return _s3;
}

/**
 * Upload one object to the archive bucket.
 */
export async function uploadToR2(
  s3: S3Client,
  bucket: string,
  objectKey: string,
  body: Buffer | string,
  contentType: string,
): Promise<void> {
  await s3.send(
    new PutObjectCommand({
      Bucket: bucket,
      Key: objectKey,
      Body: body,
      ContentType: contentType,
    }),
  );
}

/**
 * Raw snapshots keep their file name: raw/products_20240101_120000.json
 */
export function buildRawObjectKey(snapshotFileName: string): string {
  return `raw/${snapshotFileName}`;
}

/**
 * Curated exports are grouped by the UTC day the run started:
 * curated/2024-01-01/products.csv
 */
export function buildCuratedObjectKey(runStartedAt: Date, fileName: string): string {
  return `curated/${runStartedAt.toISOString().slice(0, 10)}/${fileName}`;
}
