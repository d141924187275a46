import { afterEach, describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { defineJob, JobRegistry, type WorkerConfigInput } from '@typed-jobs/core';
import { createClaimedJob } from '@typed-jobs/test-utils';
import { JobRunner, PostgresBroker, type JobStore } from '../src';
import { InMemoryJobStore } from './support/in-memory-job-store';

const processed: number[] = [];

const Square = defineJob({
  name: 'Square',
  args: z.object({ value: z.number().int() }),
  run: (ctx) => {
    processed.push(ctx.get('value') ** 2);
  }
});

const Explode = defineJob({
  name: 'Explode',
  run: () => {
    throw new Error('kaboom');
  }
});

const Other = defineJob({
  name: 'Other',
  run: () => 'never claimed'
});

const config: WorkerConfigInput = {
  jobTypes: [],
  instanceId: 'runner-test',
  maxConcurrentJobs: 3,
  pollInterval: 3600,
  heartbeatInterval: 3600
};

const runners: JobRunner[] = [];

function setup(overrides: Partial<WorkerConfigInput> = {}, registry = new JobRegistry([Square, Explode])) {
  const store = new InMemoryJobStore();
  const broker = new PostgresBroker(store);
  const runner = new JobRunner({
    store,
    registry,
    config: { ...config, ...overrides }
  });
  runners.push(runner);
  return { store, broker, runner };
}

afterEach(async () => {
  await Promise.all(runners.splice(0).map((runner) => runner.stop()));
  processed.length = 0;
});

describe('JobRunner', () => {
  it('should dispatch claimed jobs and complete them', async () => {
    const { store, broker, runner } = setup();
    await Square.withBroker(broker).submit({ value: 4 });

    await runner.start();
    await runner.onIdle();

    expect(processed).toEqual([16]);
    expect(store.rows[0]).toMatchObject({ state: 'completed', attempts: 1, locked_by: null });
  });

  it('should record failures and keep running', async () => {
    const { store, broker, runner } = setup();
    await Explode.withBroker(broker).submit();
    await Square.withBroker(broker).submit({ value: 3 });

    await runner.start();
    await runner.onIdle();

    const failed = store.rows.find((row) => row.job_type === 'Explode');
    expect(failed?.state).toBe('pending');
    expect(failed?.error).toMatch(/^Error in Explode#run: kaboom\n/);
    expect(failed?.error_details).toMatchObject({ code: 'JOB_ERROR', attempt: 1 });
    expect(processed).toEqual([9]);
    expect(runner.isRunning).toBe(true);
  });

  it('should give up after the last attempt', async () => {
    const { store, runner } = setup();
    await Explode.withBroker(new PostgresBroker(store, { maxAttempts: 1 })).submit();

    await runner.start();
    await runner.onIdle();

    expect(store.rows[0]?.state).toBe('failed');
  });

  it('should respect the concurrency limit', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const Slow = defineJob({
      name: 'Slow',
      args: z.object({ value: z.number().int() }),
      run: async (ctx) => {
        await gate;
        processed.push(ctx.get('value'));
      }
    });
    const { store, broker, runner } = setup({ maxConcurrentJobs: 2 }, new JobRegistry([Slow]));
    for (const value of [1, 2, 3]) {
      await Slow.withBroker(broker).submit({ value });
    }

    await runner.start();
    expect(runner.jobsInFlight).toBe(2);
    await expect(runner.poll()).resolves.toBe(0);

    release();
    await runner.onIdle();
    await expect(runner.poll()).resolves.toBe(1);
    await runner.onIdle();

    expect([...processed].sort((a, b) => a - b)).toEqual([1, 2, 3]);
    expect(store.rows.every((row) => row.state === 'completed')).toBe(true);
  });

  it('should only claim the configured job types', async () => {
    const { store, broker, runner } = setup({ jobTypes: ['Square'] });
    await Explode.withBroker(broker).submit();

    await runner.start();
    await runner.onIdle();

    expect(store.rows[0]?.state).toBe('pending');
    expect(runner.jobTypes()).toEqual(['Square']);
  });

  it('should claim every registered job by default', () => {
    const { runner } = setup();

    expect(runner.jobTypes()).toEqual(['Square', 'Explode']);
  });

  it('should leave unregistered job types alone', async () => {
    const { store, runner } = setup();
    await Other.withBroker(new PostgresBroker(store)).submit();

    await expect(runner.start()).resolves.toBeUndefined();

    expect(store.rows[0]?.state).toBe('pending');
  });

  it('should not claim jobs scheduled for later', async () => {
    const { store, broker, runner } = setup();
    await Square.withBroker(broker).scheduleIn(3600, { value: 5 });

    await runner.start();
    await runner.onIdle();

    expect(processed).toEqual([]);
    expect(store.rows[0]?.state).toBe('pending');
  });

  it('should fail malformed claimed rows', async () => {
    const fail = vi.fn<JobStore['fail']>().mockResolvedValue(undefined);
    const claimed = createClaimedJob({ job_type: 'Square' });
    const store: JobStore = {
      enqueue: vi.fn<JobStore['enqueue']>(),
      claim: vi
        .fn<JobStore['claim']>()
        .mockResolvedValueOnce({ job_id: claimed.job_id, job_type: 'Square' })
        .mockResolvedValue(null),
      complete: vi.fn<JobStore['complete']>(),
      fail,
      heartbeat: vi.fn<JobStore['heartbeat']>()
    };
    const runner = new JobRunner({ store, registry: new JobRegistry([Square]), config });
    runners.push(runner);

    await runner.start();

    expect(fail).toHaveBeenCalledWith(
      claimed.job_id,
      expect.objectContaining({
        message: 'Malformed job row: payload: Required; attempts: Required; max_attempts: Required'
      })
    );
    expect(processed).toEqual([]);
  });

  it('should survive claim errors', async () => {
    const store = new InMemoryJobStore();
    vi.spyOn(store, 'claim').mockRejectedValue(new Error('connection reset'));
    const runner = new JobRunner({ store, registry: new JobRegistry([Square]), config });
    runners.push(runner);

    await runner.start();

    await expect(runner.poll()).resolves.toBe(0);
    expect(runner.isRunning).toBe(true);
  });

  it('should report heartbeats while running', async () => {
    const { store, runner } = setup();

    await runner.sendHeartbeat();
    expect(store.heartbeats).toEqual([]);

    await runner.start();
    await runner.sendHeartbeat();

    expect(store.heartbeats).toHaveLength(1);
    expect(store.heartbeats[0]).toMatchObject({ instanceId: 'runner-test', jobsInFlight: 0 });
  });

  it('should stop claiming after stop', async () => {
    const { broker, runner } = setup();

    await runner.start();
    await runner.stop();
    await Square.withBroker(broker).submit({ value: 2 });

    await expect(runner.poll()).resolves.toBe(0);
    expect(runner.isRunning).toBe(false);
  });
});
