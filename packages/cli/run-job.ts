/**
 * ft-run-job: Bedrock ファインチューニングジョブの投入
 *
 * 1. 引数とハイパーパラメータを検証（AWS 呼び出し前）
 * 2. ローカルデータなら検証して S3 にアップロード
 * 3. IAM ロールを解決して CreateModelCustomizationJob
 */
import {
  EmptyDatasetError,
  type DatasetValidationReport,
} from '../application/commands/fine-tuning/validate-training-dataset';
import {
  DatasetUploadError,
  LocalDatasetRequiresBucketError,
} from '../application/commands/fine-tuning/resolve-data-uri';
import {
  FineTuningRoleNotFoundError,
  type JobSubmissionEvent,
} from '../application/commands/fine-tuning/start-fine-tuning-job.command';
import { isSupportedBaseModel, SUPPORTED_BASE_MODELS } from '../domain/fine-tuning/base-models';
import { defaultCustomModelName, generateJobName } from '../domain/fine-tuning/job-request';
import {
  HyperParameters,
  InvalidHyperParametersError,
} from '../domain/fine-tuning/value-objects/hyper-parameters';
import { resolveRegion } from '../infrastructure/config/environment';
import { awsErrorCode, awsErrorMessage, isAwsServiceError } from '../infrastructure/aws/aws-error';
import { DatasetFileNotFoundError } from '../infrastructure/dataset/jsonl-reader';
import { createLogger, serializeError, type Logger } from '../infrastructure/observability/logger';
import { FineTuningService } from '../services/fine-tuning-service';
import {
  floatFlag,
  integerFlag,
  invalidOption,
  scanFlags,
  stringFlag,
  type ParseResult,
} from './args';
import { CliError, reportCliError } from './cli-error';
import { rule, type Terminal } from './terminal';

export interface RunJobOptions {
  model: string;
  trainingData: string;
  validationData?: string;
  bucket?: string;
  jobName?: string;
  customModelName?: string;
  roleArn?: string;
  epochs: number;
  batchSize: number;
  learningRate: number;
  region?: string;
}

const BANNER_WIDTH = 60;
const MAX_REPORTED_ISSUES = 5;
const ROLE_DOCS_URL = 'https://docs.aws.amazon.com/bedrock/latest/userguide/model-customization-iam-role.html';

export const RUN_JOB_HELP = [
  'Start a Bedrock model fine-tuning (customization) job.',
  '',
  'Usage:',
  '  ft-run-job --model <id> --training-data <s3-uri|path> [options]',
  '',
  'Options:',
  `  --model <id>               Base model ID. Supported: ${SUPPORTED_BASE_MODELS.join(', ')}`,
  '  --training-data <uri|path> S3 URI (s3://...) or local path to training JSONL file.',
  '  --validation-data <uri|path>',
  '                             S3 URI or local path to validation JSONL file (optional).',
  '  --bucket <name>            S3 bucket for uploading local data and storing output.',
  '                             Required if training-data is a local path.',
  '  --job-name <name>          Name for the fine-tuning job. Default: auto-generated.',
  '  --custom-model-name <name> Name for the resulting custom model. Default: derived from job name.',
  '  --role-arn <arn>           IAM role ARN for Bedrock fine-tuning. Auto-detected if not provided.',
  '  --epochs <n>               Number of training epochs (default: 3).',
  '  --batch-size <n>           Training batch size (default: 8).',
  '  --learning-rate <x>        Learning rate (default: 0.0001).',
  '  --region <region>          AWS region. Default: AWS_REGION or the SDK configuration.',
  '  -h, --help                 show help',
  '',
  'Examples:',
  '  # Use existing S3 data',
  '  ft-run-job --model amazon.nova-micro-v1:0 --training-data s3://my-bucket/training.jsonl',
  '',
  '  # Upload local data first',
  '  ft-run-job --model amazon.nova-micro-v1:0 --training-data data/training.jsonl \\',
  '      --bucket my-finetuning-bucket',
  '',
  '  # Full customization',
  '  ft-run-job --model amazon.nova-micro-v1:0 --training-data s3://bucket/train.jsonl \\',
  '      --validation-data s3://bucket/val.jsonl --job-name mfg-qc-v2 \\',
  '      --epochs 5 --batch-size 4 --learning-rate 0.00005',
  '',
].join('\n');

export function parseRunJobArgs(args: readonly string[]): ParseResult<RunJobOptions> {
  const helpText = RUN_JOB_HELP;
  const scanned = scanFlags(
    args,
    {
      values: [
        'model',
        'training-data',
        'validation-data',
        'bucket',
        'job-name',
        'custom-model-name',
        'role-arn',
        'epochs',
        'batch-size',
        'learning-rate',
        'region',
      ],
      required: ['model', 'training-data'],
    },
    helpText
  );
  if (!scanned.ok) return scanned;
  if (scanned.help) return { ok: true, help: true, helpText };

  const { flags } = scanned;
  const epochs = integerFlag(flags, 'epochs', helpText);
  if (!epochs.ok) return epochs;
  const batchSize = integerFlag(flags, 'batch-size', helpText);
  if (!batchSize.ok) return batchSize;
  const learningRate = floatFlag(flags, 'learning-rate', helpText);
  if (!learningRate.ok) return learningRate;

  const model = stringFlag(flags, 'model');
  const trainingData = stringFlag(flags, 'training-data');
  if (!model || !trainingData) {
    return invalidOption('--model and --training-data must not be empty', helpText);
  }

  return {
    ok: true,
    help: false,
    helpText,
    options: {
      model,
      trainingData,
      validationData: stringFlag(flags, 'validation-data'),
      bucket: stringFlag(flags, 'bucket'),
      jobName: stringFlag(flags, 'job-name'),
      customModelName: stringFlag(flags, 'custom-model-name'),
      roleArn: stringFlag(flags, 'role-arn'),
      epochs: epochs.value ?? HyperParameters.DEFAULT_EPOCHS,
      batchSize: batchSize.value ?? HyperParameters.DEFAULT_BATCH_SIZE,
      learningRate: learningRate.value ?? HyperParameters.DEFAULT_LEARNING_RATE,
      region: stringFlag(flags, 'region'),
    },
  };
}

export function datasetReportLines(report: DatasetValidationReport): string[] {
  if (report.issues.length === 0) {
    return [`Validated ${report.filePath}: ${report.recordCount} records, format OK.`];
  }
  const lines = [`WARNING: Found ${report.issues.length} issue(s) in ${report.filePath}:`];
  for (const issue of report.issues.slice(0, MAX_REPORTED_ISSUES)) {
    lines.push(`  ${issue}`);
  }
  if (report.issues.length > MAX_REPORTED_ISSUES) {
    lines.push(`  ... and ${report.issues.length - MAX_REPORTED_ISSUES} more.`);
  }
  return lines;
}

export function renderSubmissionEvent(event: JobSubmissionEvent): string[] {
  switch (event.type) {
    case 'dataset-validated':
      return datasetReportLines(event.report);
    case 'dataset-uploading':
      return [`Uploading ${event.localPath} -> ${event.uri} ...`];
    case 'dataset-uploaded':
      return [`Upload complete: ${event.uri}`];
    case 'training-data-resolved':
      return [`  Training data: ${event.uri}`];
    case 'validation-data-resolved':
      return [`  Validation:    ${event.uri}`];
    case 'output-resolved':
      return [`  Output:        ${event.uri}`];
    case 'role-resolved':
      return [`  Role ARN:      ${event.roleArn}`, ''];
    case 'submitting':
      return ['Submitting fine-tuning job...'];
  }
}

/**
 * CreateModelCustomizationJob のエラーコード別診断
 */
export function submissionErrorLines(code: string, message: string): string[] {
  const lower = message.toLowerCase();
  switch (code) {
    case 'ValidationException': {
      const lines = ['', `ERROR: Validation failed: ${message}`];
      if (lower.includes('model')) {
        lines.push(
          '  The base model may not support fine-tuning in this region.',
          `  Try a different model. Supported: ${SUPPORTED_BASE_MODELS.join(', ')}`
        );
      } else if (lower.includes('data') || lower.includes('format')) {
        lines.push(
          '  Check your training data format.',
          "  Expected JSONL with 'prompt'/'completion' or 'messages' fields."
        );
      }
      return lines;
    }
    case 'ResourceNotFoundException':
      return ['', `ERROR: Resource not found: ${message}`, '  Verify the S3 bucket and data paths exist.'];
    case 'AccessDeniedException':
      return [
        '',
        `ERROR: Access denied: ${message}`,
        '  Ensure the IAM role has bedrock:CreateModelCustomizationJob permission.',
      ];
    case 'ServiceQuotaExceededException':
      return [
        '',
        `ERROR: Quota exceeded: ${message}`,
        '  You may have reached the concurrent fine-tuning job limit.',
        '  Wait for existing jobs to complete or request a quota increase.',
      ];
    case 'TooManyRequestsException':
      return ['', `ERROR: Too many requests: ${message}`, '  Wait a moment and try again.'];
    default:
      return ['', `ERROR: ${code} - ${message}`];
  }
}

export function uploadErrorLines(error: DatasetUploadError): string[] {
  switch (error.code) {
    case 'NoSuchBucket':
      return [`ERROR: Bucket '${error.bucket}' does not exist.`, `  Create it first: aws s3 mb s3://${error.bucket}`];
    case 'AccessDenied':
      return [`ERROR: Access denied to bucket '${error.bucket}'.`, '  Check your IAM permissions for s3:PutObject.'];
    default:
      return [`ERROR: ${error.message}`];
  }
}

/**
 * 投入処理中の例外をオペレーター向けの CliError に変換する
 */
export function toRunJobError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  if (error instanceof DatasetFileNotFoundError) {
    return new CliError([`ERROR: File not found: ${error.filePath}`]);
  }
  if (error instanceof EmptyDatasetError) {
    const warnings = error.report.issues.length > 0 ? datasetReportLines(error.report) : [];
    return new CliError([...warnings, `ERROR: ${error.message}`]);
  }
  if (error instanceof LocalDatasetRequiresBucketError) {
    return new CliError([`ERROR: ${error.message}`, '  Provide --bucket <bucket-name> to upload local data to S3.']);
  }
  if (error instanceof DatasetUploadError) {
    return new CliError(uploadErrorLines(error));
  }
  if (error instanceof FineTuningRoleNotFoundError) {
    return new CliError([
      '',
      `ERROR: ${error.message}`,
      '  Create a role with Bedrock and S3 permissions, then pass --role-arn <arn>.',
      `  See: ${ROLE_DOCS_URL}`,
    ]);
  }
  if (isAwsServiceError(error)) {
    return new CliError(submissionErrorLines(awsErrorCode(error), awsErrorMessage(error)));
  }
  return new CliError([`ERROR: ${serializeError(error)}`]);
}

export interface RunJobDeps {
  terminal: Terminal;
  createService?: (region: string | undefined) => FineTuningService;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * 終了コードを返す（process.exit は呼ばない）
 */
export async function runJob(args: readonly string[], deps: RunJobDeps): Promise<number> {
  const { terminal } = deps;
  const parsed = parseRunJobArgs(args);
  if (!parsed.ok) {
    terminal.error(parsed.error);
    return 2;
  }
  if (parsed.help) {
    terminal.print(parsed.helpText);
    return 0;
  }

  const options = parsed.options;
  let hyperParameters: HyperParameters;
  try {
    hyperParameters = HyperParameters.create({
      epochCount: options.epochs,
      batchSize: options.batchSize,
      learningRate: options.learningRate,
    });
  } catch (error) {
    if (error instanceof InvalidHyperParametersError) {
      terminal.error(`ERROR: ${error.message}`);
      return 2;
    }
    throw error;
  }

  const logger = deps.logger ?? createLogger('ft-run-job', { defaultLevel: 'WARN' });
  const region = resolveRegion(options.region, deps.env);
  const service = deps.createService?.(region) ?? new FineTuningService({ region, logger });

  if (!isSupportedBaseModel(options.model)) {
    terminal.print(`WARNING: Model '${options.model}' is not in the known supported list.`);
    terminal.print(`  Supported models: ${SUPPORTED_BASE_MODELS.join(', ')}`);
    terminal.print('  Proceeding anyway -- the API will reject if truly unsupported.');
    terminal.print();
  }

  const jobName = options.jobName || generateJobName();
  const customModelName = options.customModelName || defaultCustomModelName(jobName);

  terminal.print(rule(BANNER_WIDTH));
  terminal.print('Bedrock Fine-Tuning Job Configuration');
  terminal.print(rule(BANNER_WIDTH));
  terminal.print(`  Base model:    ${options.model}`);
  terminal.print(`  Job name:      ${jobName}`);
  terminal.print(`  Custom model:  ${customModelName}`);
  terminal.print(`  Epochs:        ${hyperParameters.epochCount}`);
  terminal.print(`  Batch size:    ${hyperParameters.batchSize}`);
  terminal.print(`  Learning rate: ${hyperParameters.learningRate}`);
  terminal.print(`  Region:        ${region ?? '(AWS SDK default)'}`);
  terminal.print();

  try {
    const result = await service.startJob(
      {
        baseModelIdentifier: options.model,
        trainingData: options.trainingData,
        validationData: options.validationData || undefined,
        bucket: options.bucket || undefined,
        jobName,
        customModelName,
        roleArn: options.roleArn || undefined,
        hyperParameters,
      },
      (event) => renderSubmissionEvent(event).forEach((line) => terminal.print(line))
    );

    terminal.print();
    terminal.print(rule(BANNER_WIDTH));
    terminal.print('Job submitted successfully!');
    terminal.print(rule(BANNER_WIDTH));
    terminal.print(`  Job ARN: ${result.jobArn}`);
    terminal.print(`  Job Name: ${jobName}`);
    terminal.print();
    terminal.print('Monitor progress:');
    terminal.print(`  ft-monitor-job --job-name ${jobName}`);
    terminal.print(`  ft-monitor-job --job-name ${jobName} --watch`);
    terminal.print();
    terminal.print('Or via AWS CLI:');
    terminal.print(`  aws bedrock get-model-customization-job --job-identifier ${jobName}`);
    terminal.print();
    return 0;
  } catch (error) {
    logger.debug('Fine-tuning job submission failed', { jobName, error: serializeError(error) });
    return reportCliError(toRunJobError(error), (line) => terminal.error(line));
  }
}
