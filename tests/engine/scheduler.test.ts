import { JobRunner } from '../../src/engine/build-executor';
import { CancellationSource, CancellationToken } from '../../src/engine/cancellation';
import { JobScheduler, aggregateStatus, countResults } from '../../src/engine/scheduler';
import { BuildJob, BuildJobStatus, BuildResult, createBuildResult } from '../../src/domain/job';
import { setLogHandler, resetLogHandler } from '../../src/logger';
import { LINUX, WINDOWS, makeJob } from '../helpers/fixtures';

function jobsFor(count: number): BuildJob[] {
  return Array.from({ length: count }, (_, i) => makeJob(i, i % 2 === 0 ? LINUX : WINDOWS, [`toggle-${i}`]));
}

/** A runner whose jobs fail when their index is listed. */
function scriptedRunner(failing: number[] = []): JobRunner & { started: number[] } {
  const started: number[] = [];
  return {
    started,
    async execute(job: BuildJob): Promise<Readonly<BuildResult>> {
      started.push(job.index);
      await new Promise((resolve) => setImmediate(resolve));
      return createBuildResult(job, {
        status: failing.includes(job.index) ? BuildJobStatus.Failed : BuildJobStatus.Succeeded,
        completedAt: new Date().toISOString(),
      });
    },
  };
}

describe('JobScheduler', () => {
  beforeEach(() => setLogHandler(() => {}));
  afterEach(() => resetLogHandler());

  test('runs every job and reports success in canonical order', async () => {
    const runner = scriptedRunner();
    const report = await new JobScheduler(runner).run(jobsFor(4), { concurrency: 2, policy: 'fail-fast' });

    expect(report.status).toBe('succeeded');
    expect(report.results.map((r) => r.index)).toEqual([0, 1, 2, 3]);
    expect(report.counts).toEqual({ total: 4, succeeded: 4, failed: 0, skipped: 0 });
  });

  test('never runs more jobs at once than the concurrency bound', async () => {
    let running = 0;
    let peak = 0;
    const runner: JobRunner = {
      async execute(job) {
        running++;
        peak = Math.max(peak, running);
        await new Promise((resolve) => setTimeout(resolve, 5));
        running--;
        return createBuildResult(job, { status: BuildJobStatus.Succeeded, completedAt: new Date().toISOString() });
      },
    };

    await new JobScheduler(runner).run(jobsFor(6), { concurrency: 3, policy: 'fail-continue' });

    expect(peak).toBe(3);
  });

  test('fail-fast skips jobs that have not started after the first failure', async () => {
    const runner = scriptedRunner([0]);
    const report = await new JobScheduler(runner).run(jobsFor(4), { concurrency: 1, policy: 'fail-fast' });

    expect(report.status).toBe('failed');
    expect(runner.started).toEqual([0]);
    expect(report.results.map((r) => r.status)).toEqual([
      BuildJobStatus.Failed,
      BuildJobStatus.Skipped,
      BuildJobStatus.Skipped,
      BuildJobStatus.Skipped,
    ]);
    expect(report.results[1].error?.code).toBe('SCHEDULER.CANCELED');
    expect(report.counts).toEqual({ total: 4, succeeded: 0, failed: 1, skipped: 3 });
  });

  test('fail-fast lets jobs already running finish', async () => {
    const gates: Array<() => void> = [];
    const runner: JobRunner = {
      execute(job) {
        return new Promise((resolve) => {
          gates[job.index] = () =>
            resolve(
              createBuildResult(job, {
                status: job.index === 0 ? BuildJobStatus.Failed : BuildJobStatus.Succeeded,
                completedAt: new Date().toISOString(),
              }),
            );
        });
      },
    };

    const pending = new JobScheduler(runner).run(jobsFor(3), { concurrency: 2, policy: 'fail-fast' });
    await new Promise((resolve) => setImmediate(resolve));
    gates[0]();
    await new Promise((resolve) => setImmediate(resolve));
    gates[1]();
    const report = await pending;

    expect(report.results.map((r) => r.status)).toEqual([
      BuildJobStatus.Failed,
      BuildJobStatus.Succeeded,
      BuildJobStatus.Skipped,
    ]);
    expect(report.status).toBe('failed');
  });

  test('fail-continue runs every job despite failures', async () => {
    const runner = scriptedRunner([1]);
    const report = await new JobScheduler(runner).run(jobsFor(4), { concurrency: 2, policy: 'fail-continue' });

    expect(report.status).toBe('failed');
    expect([...runner.started].sort()).toEqual([0, 1, 2, 3]);
    expect(report.counts).toEqual({ total: 4, succeeded: 3, failed: 1, skipped: 0 });
  });

  test('external cancellation skips the remaining jobs and reports canceled', async () => {
    const source = new CancellationSource();
    const runner: JobRunner = {
      async execute(job: BuildJob, token: CancellationToken) {
        if (job.index === 0) source.cancel('operator stop');
        return createBuildResult(job, {
          status: token.canceled && job.index > 0 ? BuildJobStatus.Skipped : BuildJobStatus.Succeeded,
          completedAt: new Date().toISOString(),
        });
      },
    };

    const report = await new JobScheduler(runner).run(jobsFor(3), {
      concurrency: 1,
      policy: 'fail-continue',
      token: source.token,
    });

    expect(report.status).toBe('canceled');
    expect(report.results.map((r) => r.status)).toEqual([
      BuildJobStatus.Succeeded,
      BuildJobStatus.Skipped,
      BuildJobStatus.Skipped,
    ]);
    expect(report.results[1].error?.message).toBe('Job not run: operator stop');
  });

  test('an executor that throws is recorded as a failed job', async () => {
    const runner: JobRunner = {
      async execute() {
        throw new Error('boom');
      },
    };
    const report = await new JobScheduler(runner).run(jobsFor(1), { concurrency: 1, policy: 'fail-continue' });

    expect(report.results[0].status).toBe(BuildJobStatus.Failed);
    expect(report.results[0].error?.code).toBe('SYSTEM.INTERNAL');
    expect(report.results[0].error?.message).toBe('boom');
  });

  test('reports each result and start through the callbacks', async () => {
    const started: number[] = [];
    const results: number[] = [];
    await new JobScheduler(scriptedRunner()).run(jobsFor(3), {
      concurrency: 1,
      policy: 'fail-fast',
      onJobStarted: (job) => started.push(job.index),
      onResult: (result) => results.push(result.index),
    });
    expect(started).toEqual([0, 1, 2]);
    expect(results).toEqual([0, 1, 2]);
  });

  test('zero jobs succeed trivially', async () => {
    const report = await new JobScheduler(scriptedRunner()).run([], { concurrency: 4, policy: 'fail-fast' });
    expect(report).toEqual({ status: 'succeeded', results: [], counts: { total: 0, succeeded: 0, failed: 0, skipped: 0 } });
  });

  test('rejects a non-positive concurrency', async () => {
    await expect(new JobScheduler(scriptedRunner()).run(jobsFor(1), { concurrency: 0, policy: 'fail-fast' })).rejects.toThrow(
      RangeError,
    );
  });

  test('a second batch on the same scheduler starts from a clean slate', async () => {
    const runner = scriptedRunner([0]);
    const scheduler = new JobScheduler(runner);

    const first = await scheduler.run(jobsFor(3), { concurrency: 1, policy: 'fail-fast' });
    expect(first.status).toBe('failed');
    expect(first.counts).toEqual({ total: 3, succeeded: 0, failed: 1, skipped: 2 });

    runner.started.length = 0;
    const second = await scheduler.run(jobsFor(3).map((job) => ({ ...job, index: job.index + 1 })), {
      concurrency: 1,
      policy: 'fail-fast',
    });
    expect(second.status).toBe('succeeded');
    expect(second.counts).toEqual({ total: 3, succeeded: 3, failed: 0, skipped: 0 });
    expect(runner.started).toEqual([1, 2, 3]);
    expect(scheduler.snapshot()).toEqual({
      pending: 0,
      running: [],
      counts: { total: 3, succeeded: 3, failed: 0, skipped: 0 },
      stopping: false,
    });
  });

  test('refuses a second batch while one is running', async () => {
    const scheduler = new JobScheduler(scriptedRunner());
    const first = scheduler.run(jobsFor(2), { concurrency: 1, policy: 'fail-fast' });

    await expect(scheduler.run(jobsFor(1), { concurrency: 1, policy: 'fail-fast' })).rejects.toThrow(
      'Scheduler is already running a batch of jobs',
    );
    await expect(first).resolves.toMatchObject({ status: 'succeeded' });
  });

  test('a throwing result listener does not turn a success into a failure', async () => {
    const report = await new JobScheduler(scriptedRunner()).run(jobsFor(2), {
      concurrency: 1,
      policy: 'fail-fast',
      onResult: () => {
        throw new Error('listener broke');
      },
    });

    expect(report.status).toBe('succeeded');
    expect(report.results.map((r) => r.status)).toEqual([BuildJobStatus.Succeeded, BuildJobStatus.Succeeded]);
  });

  test('a job id listed twice runs once', async () => {
    const runner = scriptedRunner();
    const [job] = jobsFor(1);

    const report = await new JobScheduler(runner).run([job, { ...job }], { concurrency: 2, policy: 'fail-continue' });

    expect(runner.started).toEqual([0]);
    expect(report.counts).toEqual({ total: 1, succeeded: 1, failed: 0, skipped: 0 });
  });

  test('the running view follows each job from pending to running', async () => {
    let release = (): void => {};
    const runner: JobRunner = {
      execute(job) {
        return new Promise((resolve) => {
          release = () =>
            resolve(createBuildResult(job, { status: BuildJobStatus.Succeeded, completedAt: new Date().toISOString() }));
        });
      },
    };
    const jobs = jobsFor(2);
    const scheduler = new JobScheduler(runner);

    const pending = scheduler.run(jobs, { concurrency: 1, policy: 'fail-fast' });
    await new Promise((resolve) => setImmediate(resolve));
    expect(scheduler.snapshot()).toEqual({
      pending: 1,
      running: [jobs[0].id],
      counts: { total: 0, succeeded: 0, failed: 0, skipped: 0 },
      stopping: false,
    });

    release();
    await new Promise((resolve) => setImmediate(resolve));
    release();
    await pending;
    expect(scheduler.snapshot().counts).toEqual({ total: 2, succeeded: 2, failed: 0, skipped: 0 });
  });
});

describe('aggregateStatus', () => {
  test('failure wins over cancellation', () => {
    expect(aggregateStatus({ total: 3, succeeded: 1, failed: 1, skipped: 1 }, true)).toBe('failed');
  });

  test('skips without an external cancel still succeed', () => {
    expect(aggregateStatus(countResults([{ status: BuildJobStatus.Skipped }]), false)).toBe('succeeded');
  });
});
