/**
 * データパス → S3 URI 解決
 *
 * - s3:// URI はそのまま
 * - ローカルパスは検証してからアップロード（--bucket 必須）
 */
import { basename } from 'path';
import { S3Uri } from '../../../domain/fine-tuning/value-objects/s3-uri';
import { awsErrorCode } from '../../../infrastructure/aws/aws-error';
import type { DatasetStore } from '../../../infrastructure/storage/dataset-store';
import type { ProgressListener } from '../command';
import {
  validateTrainingDataset,
  type DatasetValidationReport,
  type JsonlFileReader,
} from './validate-training-dataset';

export type DatasetEvent =
  | { type: 'dataset-validated'; report: DatasetValidationReport }
  | { type: 'dataset-uploading'; localPath: string; uri: string }
  | { type: 'dataset-uploaded'; uri: string };

export interface ResolveDataUriDeps {
  datasetStore: DatasetStore;
  readJsonl?: JsonlFileReader;
  onProgress?: ProgressListener<DatasetEvent>;
}

export async function resolveDataUri(
  dataPath: string | undefined,
  bucket: string | undefined,
  prefix: string,
  deps: ResolveDataUriDeps
): Promise<string | undefined> {
  if (dataPath === undefined) {
    return undefined;
  }

  if (S3Uri.isS3Uri(dataPath)) {
    return dataPath;
  }

  if (!bucket) {
    throw new LocalDatasetRequiresBucketError(dataPath);
  }

  const report = await validateTrainingDataset(dataPath, deps.readJsonl);
  deps.onProgress?.({ type: 'dataset-validated', report });

  const key = `${prefix}/${basename(dataPath)}`;
  deps.onProgress?.({
    type: 'dataset-uploading',
    localPath: dataPath,
    uri: S3Uri.of(bucket, key).toString(),
  });

  let uri: string;
  try {
    uri = await deps.datasetStore.upload(dataPath, bucket, key);
  } catch (error) {
    throw new DatasetUploadError(bucket, awsErrorCode(error), error);
  }
  deps.onProgress?.({ type: 'dataset-uploaded', uri });
  return uri;
}

export class LocalDatasetRequiresBucketError extends Error {
  constructor(public readonly dataPath: string) {
    super(`--bucket is required when using a local file path (${dataPath}).`);
    this.name = 'LocalDatasetRequiresBucketError';
  }
}

export class DatasetUploadError extends Error {
  constructor(
    public readonly bucket: string,
    public readonly code: string,
    cause: unknown
  ) {
    super(`S3 upload failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'DatasetUploadError';
  }
}
