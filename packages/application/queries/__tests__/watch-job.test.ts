/**
 * ジョブ監視ループ ユニットテスト
 */
import { describe, expect, it, vi } from 'vitest';
import { GetJobStatusHandler, GetJobStatusQuery } from '../fine-tuning/get-job-status.query';
import { watchJob, type Sleep } from '../fine-tuning/watch-job';
import { FakeGateway, snapshot } from '../../commands/__tests__/fakes';

function abortError(): Error {
  return Object.assign(new Error('The operation was aborted'), { name: 'AbortError' });
}

describe('GetJobStatusHandler', () => {
  it('should return the gateway snapshot', async () => {
    const gateway = new FakeGateway([snapshot({ status: 'Completed' })]);
    const handler = new GetJobStatusHandler(gateway);

    const result = await handler.execute(new GetJobStatusQuery('job-1'));

    expect(result.status).toBe('Completed');
  });
});

describe('watchJob', () => {
  it('should poll at a fixed interval until a terminal status', async () => {
    const gateway = new FakeGateway([
      snapshot({ status: 'InProgress' }),
      snapshot({ status: 'InProgress' }),
      snapshot({ status: 'Completed' }),
    ]);
    const sleep = vi.fn<Sleep>().mockResolvedValue(undefined);
    const polls: number[] = [];
    const onWaiting = vi.fn();

    const outcome = await watchJob({
      jobIdentifier: 'job-1',
      intervalSeconds: 30,
      handler: new GetJobStatusHandler(gateway),
      sleep,
      onSnapshot: (_, pollCount) => polls.push(pollCount),
      onWaiting,
    });

    expect(outcome).toEqual({ outcome: 'terminal', snapshot: snapshot({ status: 'Completed' }), polls: 3 });
    expect(polls).toEqual([1, 2, 3]);
    expect(sleep.mock.calls.map(([milliseconds]) => milliseconds)).toEqual([30_000, 30_000]);
    expect(onWaiting).toHaveBeenCalledTimes(2);
    expect(onWaiting).toHaveBeenCalledWith(30);
  });

  it('should stop on Failed and Stopped as well', async () => {
    for (const status of ['Failed', 'Stopped']) {
      const gateway = new FakeGateway([snapshot({ status })]);
      const sleep = vi.fn<Sleep>();

      const outcome = await watchJob({
        jobIdentifier: 'job-1',
        intervalSeconds: 60,
        handler: new GetJobStatusHandler(gateway),
        sleep,
      });

      expect(outcome).toMatchObject({ outcome: 'terminal', polls: 1 });
      expect(sleep).not.toHaveBeenCalled();
    }
  });

  it('should report an interruption when the sleep is aborted', async () => {
    const gateway = new FakeGateway([snapshot({ status: 'InProgress' })]);
    const sleep = vi.fn<Sleep>().mockRejectedValue(abortError());

    const outcome = await watchJob({
      jobIdentifier: 'job-1',
      intervalSeconds: 60,
      handler: new GetJobStatusHandler(gateway),
      sleep,
    });

    expect(outcome).toEqual({ outcome: 'interrupted', polls: 1 });
  });

  it('should pass the signal to each status lookup', async () => {
    const controller = new AbortController();
    const gateway = new FakeGateway([snapshot({ status: 'InProgress' }), snapshot({ status: 'Completed' })]);

    await watchJob({
      jobIdentifier: 'job-1',
      intervalSeconds: 60,
      handler: new GetJobStatusHandler(gateway),
      sleep: vi.fn<Sleep>().mockResolvedValue(undefined),
      signal: controller.signal,
    });

    expect(gateway.signals).toEqual([controller.signal, controller.signal]);
  });

  it('should report an interruption when the lookup is aborted', async () => {
    const controller = new AbortController();
    const gateway = new FakeGateway();
    vi.spyOn(gateway, 'getJob').mockImplementation(async () => {
      controller.abort();
      throw abortError();
    });
    const onSnapshot = vi.fn();

    const outcome = await watchJob({
      jobIdentifier: 'job-1',
      intervalSeconds: 60,
      handler: new GetJobStatusHandler(gateway),
      sleep: vi.fn<Sleep>(),
      signal: controller.signal,
      onSnapshot,
    });

    expect(outcome).toEqual({ outcome: 'interrupted', polls: 1 });
    expect(onSnapshot).not.toHaveBeenCalled();
  });

  it('should not poll once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const gateway = new FakeGateway([snapshot()]);

    const outcome = await watchJob({
      jobIdentifier: 'job-1',
      intervalSeconds: 60,
      handler: new GetJobStatusHandler(gateway),
      sleep: vi.fn<Sleep>(),
      signal: controller.signal,
    });

    expect(outcome).toEqual({ outcome: 'interrupted', polls: 0 });
  });

  it('should propagate other sleep and lookup errors', async () => {
    const gateway = new FakeGateway([snapshot()]);
    await expect(
      watchJob({
        jobIdentifier: 'job-1',
        intervalSeconds: 1,
        handler: new GetJobStatusHandler(gateway),
        sleep: vi.fn<Sleep>().mockRejectedValue(new Error('timer broke')),
      })
    ).rejects.toThrow('timer broke');

    await expect(
      watchJob({
        jobIdentifier: 'job-1',
        intervalSeconds: 1,
        handler: new GetJobStatusHandler(new FakeGateway([])),
        sleep: vi.fn<Sleep>(),
      })
    ).rejects.toThrow('no more snapshots');
  });
});
