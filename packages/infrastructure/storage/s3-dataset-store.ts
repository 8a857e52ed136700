/**
 * S3 データセット保存 アダプター
 */
import { readFile } from 'fs/promises';
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { S3Uri } from '../../domain/fine-tuning/value-objects/s3-uri';
import type { DatasetStore } from './dataset-store';

export interface S3DatasetStoreConfig {
  region?: string;
}

export const JSONL_CONTENT_TYPE = 'application/jsonl';

export class S3DatasetStore implements DatasetStore {
  private readonly client: S3Client;

  constructor(config: S3DatasetStoreConfig = {}) {
    this.client = new S3Client({ region: config.region });
  }

  async upload(localPath: string, bucket: string, key: string): Promise<string> {
    const body = await readFile(localPath);

    await this.client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: body,
        ContentType: JSONL_CONTENT_TYPE,
      })
    );

    return S3Uri.of(bucket, key).toString();
  }
}
