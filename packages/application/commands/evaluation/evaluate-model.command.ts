/**
 * EvaluateModel Command
 *
 * CQRS: テストデータに対するモデル評価
 *
 * サンプルは1件ずつ順番に呼び出す（並列化・バッチ化なし）
 */
import { computeKeywordAccuracy } from '../../../domain/evaluation/keyword-accuracy';
import {
  EvaluationRun,
  type EvaluationAverages,
  type EvaluationSummary,
  type FailedSampleResult,
  type SuccessfulSampleResult,
} from '../../../domain/evaluation/evaluation-run';
import { extractPromptAndExpected, extractSystemPrompt } from '../../../domain/evaluation/test-sample';
import type { JsonlIssue } from '../../../infrastructure/dataset/jsonl-reader';
import type { ModelInvoker } from '../../../infrastructure/model-invocation/model-invoker';
import { Command, type CommandHandler, type CommandMetadata, type ProgressListener } from '../command';
import type { JsonlFileReader } from '../fine-tuning/validate-training-dataset';
import { loadTestData } from './load-test-data';

export const DEFAULT_MAX_TOKENS = 1024;

export interface EvaluateModelPayload {
  modelId: string;
  testDataPath: string;
  maxSamples?: number;
  maxTokens: number;
}

export class EvaluateModelCommand extends Command<EvaluateModelPayload> {
  constructor(payload: EvaluateModelPayload, metadata?: Partial<CommandMetadata>) {
    super(payload, metadata);
  }
}

export type EvaluationEvent =
  | { type: 'line-skipped'; issue: JsonlIssue }
  | { type: 'samples-loaded'; count: number; filePath: string }
  | { type: 'sample-skipped'; index: number; total: number }
  | { type: 'sample-started'; index: number; total: number }
  | { type: 'sample-failed'; index: number; total: number; result: FailedSampleResult }
  | { type: 'sample-succeeded'; index: number; total: number; result: SuccessfulSampleResult; accuracy: number };

export interface EvaluateModelResult {
  summary: EvaluationSummary;
  /** 丸め前の正答率（分布表示用） */
  accuracies: readonly number[];
  averages: EvaluationAverages;
}

export interface EvaluateModelDeps {
  invoker: ModelInvoker;
  readJsonl?: JsonlFileReader;
  onProgress?: ProgressListener<EvaluationEvent>;
  now?: () => Date;
}

/**
 * EvaluateModel Handler
 */
export class EvaluateModelHandler implements CommandHandler<EvaluateModelCommand, EvaluateModelResult> {
  constructor(private readonly deps: EvaluateModelDeps) {}

  async execute(command: EvaluateModelCommand): Promise<EvaluateModelResult> {
    const { modelId, testDataPath, maxSamples, maxTokens } = command.payload;
    const { invoker, readJsonl, onProgress } = this.deps;

    const { samples, skipped } = await loadTestData(testDataPath, maxSamples, readJsonl);
    for (const issue of skipped) {
      onProgress?.({ type: 'line-skipped', issue });
    }
    onProgress?.({ type: 'samples-loaded', count: samples.length, filePath: testDataPath });

    if (samples.length === 0) {
      throw new NoTestSamplesError(testDataPath);
    }

    const total = samples.length;
    const run = new EvaluationRun(modelId, testDataPath, total);

    for (const [offset, sample] of samples.entries()) {
      const index = offset + 1;
      const extracted = extractPromptAndExpected(sample);
      if (!extracted) {
        onProgress?.({ type: 'sample-skipped', index, total });
        continue;
      }

      onProgress?.({ type: 'sample-started', index, total });
      const outcome = await invoker.invoke({
        modelId,
        prompt: extracted.prompt,
        systemPrompt: extractSystemPrompt(sample),
        maxTokens,
      });

      if (!outcome.ok) {
        const result = run.recordFailure(index, extracted.prompt, outcome.failure);
        onProgress?.({ type: 'sample-failed', index, total, result });
        continue;
      }

      const accuracy = computeKeywordAccuracy(extracted.expected, outcome.invocation.response);
      const result = run.recordSuccess(index, extracted.prompt, extracted.expected, outcome.invocation, accuracy);
      onProgress?.({ type: 'sample-succeeded', index, total, result, accuracy });
    }

    return {
      summary: run.summarize(this.deps.now?.()),
      accuracies: run.accuracies,
      averages: run.averages(),
    };
  }
}

export class NoTestSamplesError extends Error {
  constructor(public readonly filePath: string) {
    super('No test samples loaded.');
    this.name = 'NoTestSamplesError';
  }
}
