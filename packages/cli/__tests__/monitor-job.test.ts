/**
 * ft-monitor-job ユニットテスト
 */
import { EventEmitter } from 'events';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { FakeGateway, serviceError, snapshot } from '../../application/commands/__tests__/fakes';
import type { Sleep } from '../../application/queries/fine-tuning/watch-job';
import { createLogger } from '../../infrastructure/observability/logger';
import { FineTuningService } from '../../services/fine-tuning-service';
import {
  displayJobStatus,
  formatDuration,
  formatUtcTimestamp,
  interruptOnSigint,
  monitorJob,
  parseMonitorJobArgs,
  RESET_COLOR,
  type WatchInterrupt,
} from '../monitor-job';
import { rule } from '../terminal';
import { MemoryTerminal } from './memory-terminal';

const silentLogger = createLogger('test', { level: 'ERROR', sink: vi.fn() });
const OUTPUT_MODEL_ARN = 'arn:aws:bedrock:us-east-1:123456789012:custom-model/amazon.nova-micro-v1:0/abc123';

describe('parseMonitorJobArgs', () => {
  it('should default to a single check every 60 seconds', () => {
    expect(parseMonitorJobArgs(['--job-name', 'job-1'])).toMatchObject({
      ok: true,
      options: { jobName: 'job-1', watch: false, interval: 60 },
    });
  });

  it('should reject a non-positive interval', () => {
    const result = parseMonitorJobArgs(['--job-name', 'job-1', '--watch', '--interval', '0']);

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.split('\n')[0]).toBe('--interval must be a positive number of seconds: 0');
  });
});

describe('formatDuration', () => {
  it.each([
    [42, '42s'],
    [90, '1.5m'],
    [3599, '60.0m'],
    [5400, '1.5h'],
  ])('should format %d seconds as %s', (seconds, expected) => {
    expect(formatDuration(seconds)).toBe(expected);
  });
});

describe('formatUtcTimestamp', () => {
  it('should render seconds precision in UTC', () => {
    expect(formatUtcTimestamp(new Date('2026-03-01T08:05:09.750Z'))).toBe('2026-03-01 08:05:09 UTC');
  });
});

describe('displayJobStatus', () => {
  it('should render a completed job with metrics and next steps', () => {
    const job = snapshot({
      jobName: 'demo-job',
      jobArn: 'arn:aws:bedrock:us-east-1:123456789012:model-customization-job/demo-job',
      status: 'Completed',
      baseModelIdentifier: 'amazon.nova-micro-v1:0',
      outputModelName: 'custom-demo-job',
      outputModelArn: OUTPUT_MODEL_ARN,
      creationTime: new Date('2026-03-01T08:00:00Z'),
      endTime: new Date('2026-03-01T09:30:00Z'),
      hyperParameters: { learningRate: '0.0001', epochCount: '3' },
      trainingDataUri: 's3://b/train.jsonl',
      outputDataUri: 's3://b/output/',
      trainingLoss: 0.1234567,
      validationLosses: [0.2],
    });

    const lines = displayJobStatus(job, new Date('2026-03-02T00:00:00Z'));

    expect(lines.slice(0, 20)).toEqual([
      '',
      rule(),
      '  Fine-Tuning Job: demo-job',
      `  \u001b[32m[  DONE ] Status: Completed${RESET_COLOR}`,
      rule(),
      '  Job ARN:        arn:aws:bedrock:us-east-1:123456789012:model-customization-job/demo-job',
      '  Base Model:     amazon.nova-micro-v1:0',
      '  Custom Model:   custom-demo-job',
      '  Started:        2026-03-01 08:00:00 UTC',
      '  Elapsed:        1.5h',
      '  Completed:      2026-03-01 09:30:00 UTC',
      '',
      '  Hyperparameters:',
      '    epochCount: 3',
      '    learningRate: 0.0001',
      '',
      '  Training Data:  s3://b/train.jsonl',
      '  Output:         s3://b/output/',
      '',
      '  Training Metrics:',
    ]);
    expect(lines).toContain('    Training Loss:   0.123457');
    expect(lines).toContain('    Validation Loss: 0.200000');
    expect(lines).toContain(`  Output Model ARN: ${OUTPUT_MODEL_ARN}`);
    expect(lines).toContain(`       ft-evaluate --model-id ${OUTPUT_MODEL_ARN} \\`);
  });

  it('should add the duration estimate for long running jobs only', () => {
    const job = snapshot({ creationTime: new Date('2026-03-01T08:00:00Z') });

    const early = displayJobStatus(job, new Date('2026-03-01T08:04:00Z'));
    const late = displayJobStatus(job, new Date('2026-03-01T08:10:00Z'));

    expect(early).toContain('  Elapsed:        4.0m');
    expect(early).not.toContain('  Estimated:      Fine-tuning jobs typically take 1-4 hours');
    expect(late).toContain('  Estimated:      Fine-tuning jobs typically take 1-4 hours');
  });

  it('should fall back to N/A and a bracketed status', () => {
    const lines = displayJobStatus(snapshot({ jobName: undefined, status: 'Queued' }));

    expect(lines[2]).toBe('  Fine-Tuning Job: N/A');
    expect(lines[3]).toBe(`  [Queued] Status: Queued${RESET_COLOR}`);
    expect(lines[5]).toBe('  Job ARN:        N/A');
  });

  it('should show the failure reason in red', () => {
    const lines = displayJobStatus(snapshot({ status: 'Failed', failureMessage: 'Invalid training data' }));

    expect(lines).toContain(`  \u001b[31mFailure Reason: Invalid training data${RESET_COLOR}`);
  });
});

describe('monitorJob', () => {
  let gateway: FakeGateway;
  let terminal: MemoryTerminal;

  const run = (args: string[], extra: { sleep?: Sleep; interrupt?: () => WatchInterrupt } = {}) =>
    monitorJob(args, {
      terminal,
      env: {},
      logger: silentLogger,
      createService: (region) => new FineTuningService({ region, logger: silentLogger, gateway }),
      now: () => new Date(2026, 2, 1, 9, 30, 5),
      ...extra,
    });

  beforeEach(() => {
    terminal = new MemoryTerminal();
  });

  it('should show the status once without --watch', async () => {
    gateway = new FakeGateway([snapshot({ status: 'InProgress' })]);
    const interrupt = vi.fn<() => WatchInterrupt>();

    const code = await run(['--job-name', 'job-1'], { interrupt });

    expect(code).toBe(0);
    expect(terminal.lines[2]).toBe('  Fine-Tuning Job: job-1');
    expect(terminal.stdout).not.toContain('Watching');
    expect(interrupt).not.toHaveBeenCalled();
  });

  it('should release the interrupt handler after watching', async () => {
    gateway = new FakeGateway([snapshot({ status: 'Completed' })]);
    const controller = new AbortController();
    const release = vi.fn();
    const interrupt = vi.fn<() => WatchInterrupt>().mockReturnValue({ signal: controller.signal, release });

    const code = await run(['--job-name', 'job-1', '--watch'], { sleep: vi.fn<Sleep>(), interrupt });

    expect(code).toBe(0);
    expect(interrupt).toHaveBeenCalledTimes(1);
    expect(release).toHaveBeenCalledTimes(1);
    expect(gateway.signals).toEqual([controller.signal]);
  });

  it('should stop watching when interrupted during a status lookup', async () => {
    gateway = new FakeGateway();
    const controller = new AbortController();
    vi.spyOn(gateway, 'getJob').mockImplementation(async () => {
      controller.abort();
      throw Object.assign(new Error('Request aborted'), { name: 'AbortError' });
    });
    const release = vi.fn();

    const code = await run(['--job-name', 'job-1', '--watch'], {
      sleep: vi.fn<Sleep>(),
      interrupt: () => ({ signal: controller.signal, release }),
    });

    expect(code).toBe(0);
    expect(terminal.lines).toEqual([
      "Watching job 'job-1' (polling every 60s, Ctrl+C to stop)...",
      '',
      'Stopped watching. Job continues running in AWS.',
      'Resume monitoring: ft-monitor-job --job-name job-1 --watch',
      '',
    ]);
    expect(terminal.stderr).toBe('');
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('should poll until completion', async () => {
    gateway = new FakeGateway([snapshot(), snapshot({ status: 'Completed' })]);
    const sleep = vi.fn<Sleep>().mockResolvedValue(undefined);

    const code = await run(['--job-name', 'job-1', '--watch', '--interval', '15'], { sleep });

    expect(code).toBe(0);
    expect(terminal.lines[0]).toBe("Watching job 'job-1' (polling every 15s, Ctrl+C to stop)...");
    expect(terminal.lines).toContain('Next check in 15s... (Ctrl+C to stop watching)');
    expect(terminal.lines).toContain('--- Poll #2 at 09:30:05 ---');
    expect(terminal.lines).not.toContain('--- Poll #1 at 09:30:05 ---');
    expect(terminal.lines.at(-2)).toBe('Job completed successfully!');
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep.mock.calls[0][0]).toBe(15_000);
  });

  it('should exit with 1 when the job fails', async () => {
    gateway = new FakeGateway([snapshot({ status: 'Failed', failureMessage: 'bad data' })]);

    const code = await run(['--job-name', 'job-1', '--watch'], { sleep: vi.fn<Sleep>() });

    expect(code).toBe(1);
    expect(terminal.lines.at(-2)).toBe('Job failed. Check the failure reason above.');
  });

  it('should report other terminal statuses', async () => {
    gateway = new FakeGateway([snapshot({ status: 'Stopped' })]);

    const code = await run(['--job-name', 'job-1', '--watch'], { sleep: vi.fn<Sleep>() });

    expect(code).toBe(0);
    expect(terminal.lines.at(-2)).toBe('Job reached terminal status: Stopped');
  });

  it('should leave the job running when interrupted', async () => {
    gateway = new FakeGateway([snapshot()]);
    const sleep = vi
      .fn<Sleep>()
      .mockRejectedValue(Object.assign(new Error('The operation was aborted'), { name: 'AbortError' }));

    const code = await run(['--job-name', 'job-1', '--watch'], { sleep });

    expect(code).toBe(0);
    expect(terminal.lines.slice(-4)).toEqual([
      '',
      'Stopped watching. Job continues running in AWS.',
      'Resume monitoring: ft-monitor-job --job-name job-1 --watch',
      '',
    ]);
  });

  it('should explain a missing job', async () => {
    gateway = new FakeGateway();
    vi.spyOn(gateway, 'getJob').mockRejectedValue(serviceError('ResourceNotFoundException', 'not found'));

    const code = await run(['--job-name', 'ghost-job']);

    expect(code).toBe(1);
    expect(terminal.errorLines.slice(0, 3)).toEqual([
      "ERROR: Job 'ghost-job' not found.",
      '  Check the job name or use the full job ARN.',
      '  List all jobs: aws bedrock list-model-customization-jobs',
    ]);
  });

  it('should show the error code for other service errors', async () => {
    gateway = new FakeGateway();
    vi.spyOn(gateway, 'getJob').mockRejectedValue(serviceError('ThrottlingException', 'Rate exceeded'));

    const code = await run(['--job-name', 'job-1']);

    expect(code).toBe(1);
    expect(terminal.stderr).toBe('ERROR: ThrottlingException - Rate exceeded\n');
  });
});

describe('interruptOnSigint', () => {
  it('should abort on SIGINT and detach on release', () => {
    const source = new EventEmitter();

    const interrupt = interruptOnSigint(source);
    expect(source.listenerCount('SIGINT')).toBe(1);

    source.emit('SIGINT');
    expect(interrupt.signal.aborted).toBe(true);

    const second = interruptOnSigint(source);
    second.release();
    expect(source.listenerCount('SIGINT')).toBe(0);
    expect(second.signal.aborted).toBe(false);
  });
});
