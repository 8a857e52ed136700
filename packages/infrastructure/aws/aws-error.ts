/**
 * AWS SDK v3 のサービスエラー判定
 *
 * SDK のサービス例外は $metadata を持ち、name がエラーコード
 * （ValidationException, NoSuchBucket など）になる。
 */

export interface AwsServiceError extends Error {
  $metadata: unknown;
}

export function isAwsServiceError(error: unknown): error is AwsServiceError {
  return error instanceof Error && '$metadata' in error;
}

export function awsErrorCode(error: unknown): string {
  if (error instanceof Error && error.name) {
    return error.name;
  }
  return 'UnknownError';
}

export function awsErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
