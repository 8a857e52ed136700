/**
 * ft-evaluate: ファインチューニング済みモデルの評価
 *
 * テストデータを1件ずつ Converse で呼び出し、キーワード一致率を集計する
 */
import { writeFile } from 'fs/promises';
import {
  DEFAULT_MAX_TOKENS,
  NoTestSamplesError,
  type EvaluateModelResult,
  type EvaluationEvent,
} from '../application/commands/evaluation/evaluate-model.command';
import { accuracyDistribution, charLength, type EvaluationSummary } from '../domain/evaluation/evaluation-run';
import { resolveRegion } from '../infrastructure/config/environment';
import { DatasetFileNotFoundError } from '../infrastructure/dataset/jsonl-reader';
import { createLogger, serializeError, type Logger } from '../infrastructure/observability/logger';
import { FineTuningService } from '../services/fine-tuning-service';
import { integerFlag, invalidOption, scanFlags, stringFlag, type ParseResult } from './args';
import { CliError, reportCliError } from './cli-error';
import { rule, type Terminal } from './terminal';

export interface EvaluateOptions {
  modelId: string;
  testData: string;
  maxSamples?: number;
  output?: string;
  maxTokens: number;
  region?: string;
}

export const EVALUATE_HELP = [
  'Evaluate a fine-tuned Bedrock model against test data.',
  '',
  'Usage:',
  '  ft-evaluate --model-id <arn> --test-data <path> [options]',
  '',
  'Options:',
  '  --model-id <arn>      Model ARN or provisioned model ARN for the fine-tuned model.',
  '  --test-data <path>    Path to JSONL test data file.',
  '  --max-samples <n>     Maximum number of test samples to evaluate (default: all).',
  '  --output <path>       Path to save evaluation results as JSON.',
  `  --max-tokens <n>      Maximum tokens in model response (default: ${DEFAULT_MAX_TOKENS}).`,
  '  --region <region>     AWS region. Default: AWS_REGION or the SDK configuration.',
  '  -h, --help            show help',
  '',
  'Examples:',
  '  # Evaluate all validation examples',
  '  ft-evaluate --model-id arn:aws:bedrock:us-east-1:123:custom-model/my-model \\',
  '      --test-data data/validation.jsonl',
  '',
  '  # Evaluate first 5 examples only',
  '  ft-evaluate --model-id arn:aws:bedrock:... --test-data data/validation.jsonl --max-samples 5',
  '',
  '  # Save results to file',
  '  ft-evaluate --model-id arn:aws:bedrock:... --test-data data/validation.jsonl \\',
  '      --output eval_results.json',
  '',
].join('\n');

export function parseEvaluateArgs(args: readonly string[]): ParseResult<EvaluateOptions> {
  const helpText = EVALUATE_HELP;
  const scanned = scanFlags(
    args,
    {
      values: ['model-id', 'test-data', 'max-samples', 'output', 'max-tokens', 'region'],
      required: ['model-id', 'test-data'],
    },
    helpText
  );
  if (!scanned.ok) return scanned;
  if (scanned.help) return { ok: true, help: true, helpText };

  const { flags } = scanned;
  const maxSamples = integerFlag(flags, 'max-samples', helpText);
  if (!maxSamples.ok) return maxSamples;
  if (maxSamples.value !== undefined && maxSamples.value < 0) {
    return invalidOption(`--max-samples must not be negative: ${maxSamples.value}`, helpText);
  }
  const maxTokens = integerFlag(flags, 'max-tokens', helpText);
  if (!maxTokens.ok) return maxTokens;
  if (maxTokens.value !== undefined && maxTokens.value < 1) {
    return invalidOption(`--max-tokens must be positive: ${maxTokens.value}`, helpText);
  }

  const modelId = stringFlag(flags, 'model-id');
  const testData = stringFlag(flags, 'test-data');
  if (!modelId || !testData) {
    return invalidOption('--model-id and --test-data must not be empty', helpText);
  }

  return {
    ok: true,
    help: false,
    helpText,
    options: {
      modelId,
      testData,
      maxSamples: maxSamples.value,
      output: stringFlag(flags, 'output'),
      maxTokens: maxTokens.value ?? DEFAULT_MAX_TOKENS,
      region: stringFlag(flags, 'region'),
    },
  };
}

/** 0.875 → "87.5%"（digits は小数点以下の桁数） */
export function formatPercent(ratio: number, digits: number): string {
  return `${(ratio * 100).toFixed(digits)}%`;
}

export function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

export function createProgressRenderer(terminal: Terminal, modelId: string): (event: EvaluationEvent) => void {
  return (event) => {
    switch (event.type) {
      case 'line-skipped':
        terminal.print(`WARNING: Skipping invalid JSON at line ${event.issue.lineNumber}: ${event.issue.message}`);
        return;
      case 'samples-loaded':
        terminal.print(`Loaded ${event.count} test samples from ${event.filePath}`);
        if (event.count > 0) {
          terminal.print();
          terminal.print(rule());
          terminal.print(`  Evaluating: ${modelId}`);
          terminal.print(`  Test data:  ${event.filePath}`);
          terminal.print(`  Samples:    ${event.count}`);
          terminal.print(rule());
          terminal.print();
        }
        return;
      case 'sample-skipped':
        terminal.print(`  [${event.index}/${event.total}] SKIP -- no prompt found in record`);
        return;
      case 'sample-started':
        terminal.write(`  [${event.index}/${event.total}] Evaluating... `);
        return;
      case 'sample-failed':
        terminal.print(`ERROR: ${event.result.error}`);
        return;
      case 'sample-succeeded': {
        const { result } = event;
        terminal.print(
          `OK  latency=${result.latency_seconds.toFixed(1)}s  ` +
            `tokens=${result.input_tokens}+${result.output_tokens}  ` +
            `accuracy=${formatPercent(event.accuracy, 0)}  ` +
            `len=${charLength(result.response)}`
        );
        return;
      }
    }
  };
}

/**
 * 平均値は丸める前の値から表示する（JSON の metrics は丸め済み）
 */
export function summaryLines({ summary, accuracies, averages }: EvaluateModelResult): string[] {
  const { metrics } = summary;
  const lines = [
    '',
    rule(),
    '  EVALUATION SUMMARY',
    rule(),
    `  Model:              ${summary.model_id}`,
    `  Samples:            ${summary.total_samples} total, ${summary.successful} successful, ${summary.errors} errors`,
    `  Keyword Accuracy:   ${formatPercent(averages.keywordAccuracy, 1)}`,
    `  Avg Latency:        ${averages.latencySeconds.toFixed(2)}s`,
    `  Avg Response Len:   ${averages.responseLengthChars.toFixed(0)} chars`,
    `  Total Input Tokens: ${formatCount(metrics.total_input_tokens)}`,
    `  Total Output Tokens:${formatCount(metrics.total_output_tokens)}`,
    `  Total Tokens:       ${formatCount(metrics.total_tokens)}`,
    rule(),
  ];

  if (accuracies.length > 0) {
    lines.push('', '  Accuracy Distribution:');
    for (const bucket of accuracyDistribution(accuracies)) {
      lines.push(`    ${bucket.label.padStart(8)}: ${String(bucket.count).padStart(3)} ${'#'.repeat(bucket.count)}`);
    }
  }
  lines.push('');
  return lines;
}

export async function writeResults(filePath: string, summary: EvaluationSummary): Promise<void> {
  await writeFile(filePath, `${JSON.stringify(summary, null, 2)}\n`, 'utf8');
}

export function toEvaluateError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  if (error instanceof DatasetFileNotFoundError) {
    return new CliError([`ERROR: Test data file not found: ${error.filePath}`]);
  }
  if (error instanceof NoTestSamplesError) {
    return new CliError([`ERROR: ${error.message}`]);
  }
  return new CliError([`ERROR: ${serializeError(error)}`]);
}

export interface EvaluateDeps {
  terminal: Terminal;
  createService?: (region: string | undefined) => FineTuningService;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export async function evaluate(args: readonly string[], deps: EvaluateDeps): Promise<number> {
  const { terminal } = deps;
  const parsed = parseEvaluateArgs(args);
  if (!parsed.ok) {
    terminal.error(parsed.error);
    return 2;
  }
  if (parsed.help) {
    terminal.print(parsed.helpText);
    return 0;
  }

  const options = parsed.options;
  const logger = deps.logger ?? createLogger('ft-evaluate', { defaultLevel: 'WARN' });
  const region = resolveRegion(options.region, deps.env);
  const service = deps.createService?.(region) ?? new FineTuningService({ region, logger });

  try {
    const result = await service.evaluate(
      {
        modelId: options.modelId,
        testDataPath: options.testData,
        maxSamples: options.maxSamples,
        maxTokens: options.maxTokens,
      },
      createProgressRenderer(terminal, options.modelId)
    );

    summaryLines(result).forEach((line) => terminal.print(line));

    if (options.output) {
      await writeResults(options.output, result.summary);
      terminal.print(`Results saved to: ${options.output}`);
    } else {
      terminal.print('Tip: Use --output results.json to save detailed results.');
    }
    return 0;
  } catch (error) {
    logger.debug('Evaluation failed', { modelId: options.modelId, error: serializeError(error) });
    return reportCliError(toEvaluateError(error), (line) => terminal.error(line));
  }
}
