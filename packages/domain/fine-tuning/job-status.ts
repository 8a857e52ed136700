/**
 * モデルカスタマイズジョブのステータス
 */
export enum JobStatus {
  IN_PROGRESS = 'InProgress',
  COMPLETED = 'Completed',
  FAILED = 'Failed',
  STOPPING = 'Stopping',
  STOPPED = 'Stopped',
}

const TERMINAL_STATUSES: ReadonlySet<string> = new Set([
  JobStatus.COMPLETED,
  JobStatus.FAILED,
  JobStatus.STOPPED,
]);

export function isTerminalStatus(status: string): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * GetModelCustomizationJob の表示用スナップショット
 */
export interface FineTuningJobSnapshot {
  jobName?: string;
  jobArn?: string;
  status: string;
  baseModelIdentifier?: string;
  outputModelName?: string;
  outputModelArn?: string;
  creationTime?: Date;
  endTime?: Date;
  hyperParameters: Record<string, string>;
  trainingDataUri?: string;
  validationDataUris: string[];
  outputDataUri?: string;
  trainingLoss?: number;
  validationLosses: number[];
  failureMessage?: string;
}
