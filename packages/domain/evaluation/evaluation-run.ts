/**
 * 評価結果の集計
 *
 * 結果 JSON（--output）のキーは snake_case のまま出力する
 */

export interface ModelInvocation {
  response: string;
  latencySeconds: number;
  inputTokens: number;
  outputTokens: number;
  stopReason: string;
}

export interface InvocationFailure {
  error: string;
  latencySeconds: number;
}

export interface SuccessfulSampleResult {
  sample_index: number;
  prompt: string;
  expected: string;
  response: string;
  latency_seconds: number;
  input_tokens: number;
  output_tokens: number;
  stop_reason: string;
  keyword_accuracy: number;
}

export interface FailedSampleResult {
  sample_index: number;
  prompt: string;
  response: null;
  latency_seconds: number;
  input_tokens: number;
  output_tokens: number;
  error: string;
}

export type SampleResult = SuccessfulSampleResult | FailedSampleResult;

export interface EvaluationMetrics {
  avg_keyword_accuracy: number;
  avg_latency_seconds: number;
  avg_response_length_chars: number;
  total_input_tokens: number;
  total_output_tokens: number;
  total_tokens: number;
}

export interface EvaluationSummary {
  model_id: string;
  test_data: string;
  timestamp: string;
  total_samples: number;
  successful: number;
  errors: number;
  metrics: EvaluationMetrics;
  results: SampleResult[];
}

/** 丸める前の平均値（サマリー表示用） */
export interface EvaluationAverages {
  keywordAccuracy: number;
  latencySeconds: number;
  responseLengthChars: number;
}

export interface AccuracyBucket {
  label: string;
  count: number;
}

const PROMPT_PREVIEW_LENGTH = 200;
const FAILED_PROMPT_PREVIEW_LENGTH = 100;

/**
 * 文字数（コードポイント単位。サロゲートペアは1文字）
 */
export function charLength(text: string): number {
  return Array.from(text).length;
}

export function truncateText(text: string, maxLength: number): string {
  const chars = Array.from(text);
  return chars.length > maxLength ? `${chars.slice(0, maxLength).join('')}...` : text;
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function isFailedResult(result: SampleResult): result is FailedSampleResult {
  return 'error' in result;
}

/**
 * 正答率の分布（90-100%, 70-89%, 50-69%, <50%）
 */
export function accuracyDistribution(accuracies: readonly number[]): AccuracyBucket[] {
  const buckets: AccuracyBucket[] = [
    { label: '90-100%', count: 0 },
    { label: '70-89%', count: 0 },
    { label: '50-69%', count: 0 },
    { label: '<50%', count: 0 },
  ];
  for (const accuracy of accuracies) {
    if (accuracy >= 0.9) buckets[0].count++;
    else if (accuracy >= 0.7) buckets[1].count++;
    else if (accuracy >= 0.5) buckets[2].count++;
    else buckets[3].count++;
  }
  return buckets;
}

/**
 * 1回の評価実行の集計器
 *
 * 平均値は丸める前の値から計算する
 */
export class EvaluationRun {
  private readonly results: SampleResult[] = [];
  private readonly rawAccuracies: number[] = [];
  private errorCount = 0;
  private totalLatency = 0;
  private totalInputTokens = 0;
  private totalOutputTokens = 0;
  private totalResponseLength = 0;

  constructor(
    private readonly modelId: string,
    private readonly testData: string,
    private readonly totalSamples: number
  ) {}

  get accuracies(): readonly number[] {
    return this.rawAccuracies;
  }

  recordSuccess(
    sampleIndex: number,
    prompt: string,
    expected: string,
    invocation: ModelInvocation,
    accuracy: number
  ): SuccessfulSampleResult {
    this.rawAccuracies.push(accuracy);
    this.totalLatency += invocation.latencySeconds;
    this.totalInputTokens += invocation.inputTokens;
    this.totalOutputTokens += invocation.outputTokens;
    this.totalResponseLength += charLength(invocation.response);

    const result: SuccessfulSampleResult = {
      sample_index: sampleIndex,
      prompt: truncateText(prompt, PROMPT_PREVIEW_LENGTH),
      expected: truncateText(expected, PROMPT_PREVIEW_LENGTH),
      response: invocation.response,
      latency_seconds: invocation.latencySeconds,
      input_tokens: invocation.inputTokens,
      output_tokens: invocation.outputTokens,
      stop_reason: invocation.stopReason,
      keyword_accuracy: roundTo(accuracy, 4),
    };
    this.results.push(result);
    return result;
  }

  recordFailure(sampleIndex: number, prompt: string, failure: InvocationFailure): FailedSampleResult {
    this.errorCount++;
    const result: FailedSampleResult = {
      sample_index: sampleIndex,
      prompt: truncateText(prompt, FAILED_PROMPT_PREVIEW_LENGTH),
      response: null,
      latency_seconds: failure.latencySeconds,
      input_tokens: 0,
      output_tokens: 0,
      error: failure.error,
    };
    this.results.push(result);
    return result;
  }

  get successful(): number {
    return this.results.length - this.errorCount;
  }

  averages(): EvaluationAverages {
    const successful = this.successful;
    return {
      keywordAccuracy:
        this.rawAccuracies.length > 0
          ? this.rawAccuracies.reduce((sum, value) => sum + value, 0) / this.rawAccuracies.length
          : 0,
      latencySeconds: successful > 0 ? this.totalLatency / successful : 0,
      responseLengthChars: successful > 0 ? this.totalResponseLength / successful : 0,
    };
  }

  summarize(now: Date = new Date()): EvaluationSummary {
    const successful = this.successful;
    const averages = this.averages();

    return {
      model_id: this.modelId,
      test_data: this.testData,
      timestamp: now.toISOString(),
      total_samples: this.totalSamples,
      successful,
      errors: this.errorCount,
      metrics: {
        avg_keyword_accuracy: roundTo(averages.keywordAccuracy, 4),
        avg_latency_seconds: roundTo(averages.latencySeconds, 3),
        avg_response_length_chars: roundTo(averages.responseLengthChars, 0),
        total_input_tokens: this.totalInputTokens,
        total_output_tokens: this.totalOutputTokens,
        total_tokens: this.totalInputTokens + this.totalOutputTokens,
      },
      results: [...this.results],
    };
  }
}
