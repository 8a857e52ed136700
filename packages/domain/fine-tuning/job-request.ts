/**
 * ファインチューニングジョブ記述子
 *
 * CreateModelCustomizationJob に渡す内容をドメイン側で組み立てる。
 * SDK 型への変換は infrastructure 層のアダプターが担当。
 */
import { randomUUID } from 'crypto';
import { HyperParameters } from './value-objects/hyper-parameters';
import { S3Uri } from './value-objects/s3-uri';

export const CUSTOMIZATION_TYPE = 'FINE_TUNING';

export interface FineTuningJobRequest {
  jobName: string;
  customModelName: string;
  roleArn: string;
  baseModelIdentifier: string;
  trainingDataUri: string;
  validationDataUri?: string;
  outputDataUri: string;
  hyperParameters: HyperParameters;
}

export function generateJobName(shortId: string = randomUUID().replace(/-/g, '').slice(0, 6)): string {
  return `finetune-${shortId}`;
}

export function defaultCustomModelName(jobName: string): string {
  return `custom-${jobName}`;
}

/**
 * ジョブごとのデータ格納プレフィックス
 */
export function dataPrefixFor(jobName: string): string {
  return `fine-tuning/${jobName}`;
}

/**
 * 出力先 URI
 *
 * バケット指定がなければ学習データと同じバケットに出力する
 */
export function outputUriFor(prefix: string, trainingDataUri: string, bucket?: string): string {
  const outputBucket = bucket ?? S3Uri.parse(trainingDataUri).bucket;
  return S3Uri.of(outputBucket, `${prefix}/output/`).toString();
}
