/**
 * モデルカスタマイズ ポート（インターフェース）
 *
 * Bedrock 実装はアダプターで提供
 */
import type { FineTuningJobRequest } from '../../domain/fine-tuning/job-request';
import type { FineTuningJobSnapshot } from '../../domain/fine-tuning/job-status';

export interface SubmittedJob {
  jobArn: string;
}

export interface ModelCustomizationGateway {
  /**
   * ジョブを作成・開始
   */
  createJob(request: FineTuningJobRequest): Promise<SubmittedJob>;

  /**
   * ジョブ名または ARN で現在の状態を取得（signal の中断でリクエストも中断）
   */
  getJob(jobIdentifier: string, signal?: AbortSignal): Promise<FineTuningJobSnapshot>;
}
