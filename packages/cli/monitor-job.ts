/**
 * ft-monitor-job: ファインチューニングジョブの状態表示・監視
 */
import { setTimeout as delay } from 'timers/promises';
import type { Sleep, WatchJobOutcome } from '../application/queries/fine-tuning/watch-job';
import { JobStatus, type FineTuningJobSnapshot } from '../domain/fine-tuning/job-status';
import { awsErrorCode, awsErrorMessage, isAwsServiceError } from '../infrastructure/aws/aws-error';
import { resolveRegion } from '../infrastructure/config/environment';
import { createLogger, serializeError, type Logger } from '../infrastructure/observability/logger';
import { FineTuningService } from '../services/fine-tuning-service';
import { integerFlag, invalidOption, scanFlags, stringFlag, switchFlag, type ParseResult } from './args';
import { CliError, reportCliError } from './cli-error';
import { rule, type Terminal } from './terminal';

export interface MonitorJobOptions {
  jobName: string;
  watch: boolean;
  interval: number;
  region?: string;
}

export const DEFAULT_POLL_INTERVAL_SECONDS = 60;

/** 「通常1〜4時間」の案内を出すまでの経過時間 */
const ESTIMATE_NOTICE_AFTER_MINUTES = 5;

const STATUS_ICONS: Record<string, string> = {
  [JobStatus.IN_PROGRESS]: '[RUNNING]',
  [JobStatus.COMPLETED]: '[  DONE ]',
  [JobStatus.FAILED]: '[FAILED ]',
  [JobStatus.STOPPING]: '[STOPPING]',
  [JobStatus.STOPPED]: '[STOPPED]',
};

const YELLOW = '\u001b[33m';
const GREEN = '\u001b[32m';
const RED = '\u001b[31m';
const GRAY = '\u001b[90m';
export const RESET_COLOR = '\u001b[0m';

const STATUS_COLORS: Record<string, string> = {
  [JobStatus.IN_PROGRESS]: YELLOW,
  [JobStatus.COMPLETED]: GREEN,
  [JobStatus.FAILED]: RED,
  [JobStatus.STOPPING]: YELLOW,
  [JobStatus.STOPPED]: GRAY,
};

export const MONITOR_JOB_HELP = [
  'Monitor a Bedrock model fine-tuning job.',
  '',
  'Usage:',
  '  ft-monitor-job --job-name <name|arn> [--watch] [--interval <seconds>]',
  '',
  'Options:',
  '  --job-name <name|arn>  Name or ARN of the fine-tuning job to monitor.',
  '  --watch                Continuously poll until the job completes or fails.',
  `  --interval <seconds>   Polling interval in seconds when --watch is enabled (default: ${DEFAULT_POLL_INTERVAL_SECONDS}).`,
  '  --region <region>      AWS region. Default: AWS_REGION or the SDK configuration.',
  '  -h, --help             show help',
  '',
  'Examples:',
  '  # Check status once',
  '  ft-monitor-job --job-name my-finetune-job',
  '',
  '  # Watch until completion (poll every 60s)',
  '  ft-monitor-job --job-name my-finetune-job --watch',
  '',
  '  # Custom poll interval',
  '  ft-monitor-job --job-name my-finetune-job --watch --interval 30',
  '',
].join('\n');

export function parseMonitorJobArgs(args: readonly string[]): ParseResult<MonitorJobOptions> {
  const helpText = MONITOR_JOB_HELP;
  const scanned = scanFlags(
    args,
    { values: ['job-name', 'interval', 'region'], switches: ['watch'], required: ['job-name'] },
    helpText
  );
  if (!scanned.ok) return scanned;
  if (scanned.help) return { ok: true, help: true, helpText };

  const { flags } = scanned;
  const interval = integerFlag(flags, 'interval', helpText);
  if (!interval.ok) return interval;
  if (interval.value !== undefined && interval.value < 1) {
    return invalidOption(`--interval must be a positive number of seconds: ${interval.value}`, helpText);
  }

  const jobName = stringFlag(flags, 'job-name');
  if (!jobName) {
    return invalidOption('--job-name must not be empty', helpText);
  }

  return {
    ok: true,
    help: false,
    helpText,
    options: {
      jobName,
      watch: switchFlag(flags, 'watch'),
      interval: interval.value ?? DEFAULT_POLL_INTERVAL_SECONDS,
      region: stringFlag(flags, 'region'),
    },
  };
}

export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${seconds.toFixed(0)}s`;
  }
  if (seconds < 3600) {
    return `${(seconds / 60).toFixed(1)}m`;
  }
  return `${(seconds / 3600).toFixed(1)}h`;
}

/**
 * YYYY-MM-DD HH:MM:SS UTC
 */
export function formatUtcTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

/**
 * HH:MM:SS（ローカル時刻）
 */
export function formatClockTime(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function displayJobStatus(job: FineTuningJobSnapshot, now: Date = new Date()): string[] {
  const status = job.status;
  const color = STATUS_COLORS[status] ?? '';
  const icon = STATUS_ICONS[status] ?? `[${status}]`;
  const lines: string[] = [];

  lines.push('');
  lines.push(rule());
  lines.push(`  Fine-Tuning Job: ${job.jobName ?? 'N/A'}`);
  lines.push(`  ${color}${icon} Status: ${status}${RESET_COLOR}`);
  lines.push(rule());

  lines.push(`  Job ARN:        ${job.jobArn ?? 'N/A'}`);
  lines.push(`  Base Model:     ${job.baseModelIdentifier ?? 'N/A'}`);
  lines.push(`  Custom Model:   ${job.outputModelName ?? 'N/A'}`);

  const { creationTime, endTime } = job;
  if (creationTime) {
    lines.push(`  Started:        ${formatUtcTimestamp(creationTime)}`);
    const elapsedSeconds = ((endTime ?? now).getTime() - creationTime.getTime()) / 1000;
    lines.push(`  Elapsed:        ${formatDuration(elapsedSeconds)}`);
  }

  if (endTime) {
    lines.push(`  Completed:      ${formatUtcTimestamp(endTime)}`);
  } else if (creationTime && status === JobStatus.IN_PROGRESS) {
    const elapsedMinutes = (now.getTime() - creationTime.getTime()) / 60_000;
    if (elapsedMinutes > ESTIMATE_NOTICE_AFTER_MINUTES) {
      lines.push('  Estimated:      Fine-tuning jobs typically take 1-4 hours');
    }
  }

  const hyperParameterKeys = Object.keys(job.hyperParameters).sort();
  if (hyperParameterKeys.length > 0) {
    lines.push('');
    lines.push('  Hyperparameters:');
    for (const key of hyperParameterKeys) {
      lines.push(`    ${key}: ${job.hyperParameters[key]}`);
    }
  }

  if (job.trainingDataUri) {
    lines.push('');
    lines.push(`  Training Data:  ${job.trainingDataUri}`);
  }
  for (const uri of job.validationDataUris) {
    lines.push(`  Validation:     ${uri}`);
  }
  if (job.outputDataUri) {
    lines.push(`  Output:         ${job.outputDataUri}`);
  }

  if (job.trainingLoss !== undefined) {
    lines.push('');
    lines.push('  Training Metrics:');
    lines.push(`    Training Loss:   ${job.trainingLoss.toFixed(6)}`);
  }
  if (job.validationLosses.length > 0) {
    lines.push('  Validation Metrics:');
    for (const loss of job.validationLosses) {
      lines.push(`    Validation Loss: ${loss.toFixed(6)}`);
    }
  }

  if (job.outputModelArn) {
    lines.push(
      '',
      `  Output Model ARN: ${job.outputModelArn}`,
      '',
      '  Next steps:',
      '    1. Create provisioned throughput:',
      '       aws bedrock create-provisioned-model-throughput \\',
      `         --model-id ${job.outputModelArn} \\`,
      '         --provisioned-model-name my-custom-model \\',
      '         --model-units 1',
      '',
      '    2. Or evaluate the model:',
      `       ft-evaluate --model-id ${job.outputModelArn} \\`,
      '         --test-data data/validation.jsonl'
    );
  }

  if (job.failureMessage) {
    lines.push('');
    lines.push(`  ${RED}Failure Reason: ${job.failureMessage}${RESET_COLOR}`);
  }

  lines.push('');
  return lines;
}

export function toMonitorJobError(error: unknown, jobName: string): CliError {
  if (!isAwsServiceError(error)) {
    return new CliError([`ERROR: ${serializeError(error)}`]);
  }
  const code = awsErrorCode(error);
  switch (code) {
    case 'ResourceNotFoundException':
      return new CliError([
        `ERROR: Job '${jobName}' not found.`,
        '  Check the job name or use the full job ARN.',
        '  List all jobs: aws bedrock list-model-customization-jobs',
      ]);
    case 'AccessDeniedException':
      return new CliError([
        'ERROR: Access denied. Check your IAM permissions for bedrock:GetModelCustomizationJob.',
      ]);
    default:
      return new CliError([`ERROR: ${code} - ${awsErrorMessage(error)}`]);
  }
}

export const abortableSleep: Sleep = async (milliseconds, signal) => {
  await delay(milliseconds, undefined, { signal });
};

export interface WatchInterrupt {
  signal: AbortSignal;
  release: () => void;
}

type SignalSource = Pick<NodeJS.EventEmitter, 'once' | 'removeListener'>;

/**
 * Ctrl+C で中断される signal（監視だけを止め、ジョブは AWS 側で継続）
 */
export function interruptOnSigint(source: SignalSource = process): WatchInterrupt {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  source.once('SIGINT', onInterrupt);
  return {
    signal: controller.signal,
    release: () => {
      source.removeListener('SIGINT', onInterrupt);
    },
  };
}

export interface MonitorJobDeps {
  terminal: Terminal;
  createService?: (region: string | undefined) => FineTuningService;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  sleep?: Sleep;
  /** --watch のときだけ呼ばれる */
  interrupt?: () => WatchInterrupt;
  now?: () => Date;
}

export async function monitorJob(args: readonly string[], deps: MonitorJobDeps): Promise<number> {
  const { terminal } = deps;
  const parsed = parseMonitorJobArgs(args);
  if (!parsed.ok) {
    terminal.error(parsed.error);
    return 2;
  }
  if (parsed.help) {
    terminal.print(parsed.helpText);
    return 0;
  }

  const { jobName, watch, interval } = parsed.options;
  const logger = deps.logger ?? createLogger('ft-monitor-job', { defaultLevel: 'WARN' });
  const region = resolveRegion(parsed.options.region, deps.env);
  const service = deps.createService?.(region) ?? new FineTuningService({ region, logger });
  const now = deps.now ?? (() => new Date());
  const show = (job: FineTuningJobSnapshot) => displayJobStatus(job, now()).forEach((line) => terminal.print(line));

  try {
    if (!watch) {
      show(await service.getJob(jobName));
      return 0;
    }

    terminal.print(`Watching job '${jobName}' (polling every ${interval}s, Ctrl+C to stop)...`);
    const interrupt = deps.interrupt?.();
    let outcome: WatchJobOutcome;
    try {
      outcome = await service.watchJob(jobName, {
        intervalSeconds: interval,
        sleep: deps.sleep ?? abortableSleep,
        signal: interrupt?.signal,
        onSnapshot: (job, pollCount) => {
          if (pollCount > 1) {
            terminal.print();
            terminal.print(`--- Poll #${pollCount} at ${formatClockTime(now())} ---`);
          }
          show(job);
        },
        onWaiting: (seconds) => terminal.print(`Next check in ${seconds}s... (Ctrl+C to stop watching)`),
      });
    } finally {
      interrupt?.release();
    }

    if (outcome.outcome === 'interrupted') {
      terminal.print();
      terminal.print('Stopped watching. Job continues running in AWS.');
      terminal.print(`Resume monitoring: ft-monitor-job --job-name ${jobName} --watch`);
      return 0;
    }

    switch (outcome.snapshot.status) {
      case JobStatus.COMPLETED:
        terminal.print('Job completed successfully!');
        return 0;
      case JobStatus.FAILED:
        terminal.print('Job failed. Check the failure reason above.');
        return 1;
      default:
        terminal.print(`Job reached terminal status: ${outcome.snapshot.status}`);
        return 0;
    }
  } catch (error) {
    logger.debug('Job status lookup failed', { jobName, error: serializeError(error) });
    return reportCliError(toMonitorJobError(error, jobName), (line) => terminal.error(line));
  }
}
