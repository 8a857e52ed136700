/**
 * ジョブ監視ループ
 *
 * 固定間隔でポーリングし、終了ステータスで停止する（バックオフなし）。
 * signal が中断されたら監視だけを止める（ジョブは AWS 側で継続）。
 * 取得中のリクエストも同じ signal で中断する。
 */
import { isTerminalStatus, type FineTuningJobSnapshot } from '../../../domain/fine-tuning/job-status';
import { GetJobStatusQuery, type GetJobStatusHandler } from './get-job-status.query';

export type Sleep = (milliseconds: number, signal?: AbortSignal) => Promise<void>;

export interface WatchJobOptions {
  jobIdentifier: string;
  intervalSeconds: number;
  handler: Pick<GetJobStatusHandler, 'execute'>;
  sleep: Sleep;
  signal?: AbortSignal;
  onSnapshot?: (snapshot: FineTuningJobSnapshot, pollCount: number) => void;
  onWaiting?: (intervalSeconds: number) => void;
}

export type WatchJobOutcome =
  | { outcome: 'terminal'; snapshot: FineTuningJobSnapshot; polls: number }
  | { outcome: 'interrupted'; polls: number };

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export async function watchJob(options: WatchJobOptions): Promise<WatchJobOutcome> {
  const { jobIdentifier, intervalSeconds, handler, sleep, signal } = options;
  let polls = 0;

  while (!signal?.aborted) {
    polls++;
    let snapshot: FineTuningJobSnapshot;
    try {
      snapshot = await handler.execute(new GetJobStatusQuery(jobIdentifier, signal));
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) break;
      throw error;
    }
    options.onSnapshot?.(snapshot, polls);

    if (isTerminalStatus(snapshot.status)) {
      return { outcome: 'terminal', snapshot, polls };
    }

    options.onWaiting?.(intervalSeconds);
    try {
      await sleep(intervalSeconds * 1000, signal);
    } catch (error) {
      if (isAbortError(error)) break;
      throw error;
    }
  }

  return { outcome: 'interrupted', polls };
}
