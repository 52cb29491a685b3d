/**
 * Job Scheduler — bounded-parallel execution of a matrix's build jobs.
 *
 * Jobs are drawn from one queue by up to `concurrency` workers. Results may
 * arrive in any order; the report lists them in canonical job order.
 *
 * Policies:
 * - fail-fast: after the first Failed result no further job starts; jobs
 *   already running finish and are recorded, the rest are Skipped.
 * - fail-continue: every job runs regardless of earlier failures.
 *
 * External cancellation (a run cancel) is passed to running executors as a
 * live token, so they stop at their next safe point.
 */

import { OrchestratorError, canceledBySchedulerError, createTypedError, describeError } from '../domain/errors';
import { BuildJob, BuildJobStatus, BuildResult, createBuildResult, describeJob } from '../domain/job';
import { FailurePolicy } from '../domain/pipeline';
import { RunCounts } from '../domain/run';
import { Logger, logger as rootLogger } from '../logger';
import { CancellationToken, NEVER_CANCELED } from './cancellation';
import { JobRunner } from './build-executor';
import { transitionJobStatus } from './state-machine';

export interface SchedulerOptions {
  concurrency: number;
  policy: FailurePolicy;
  /** External cancellation, e.g. an operator canceling the run. */
  token?: CancellationToken;
  onJobStarted?: (job: BuildJob) => void;
  onResult?: (result: Readonly<BuildResult>) => void;
}

export type AggregateStatus = 'succeeded' | 'failed' | 'canceled';

export interface SchedulerReport {
  status: AggregateStatus;
  /** Results in canonical job order. */
  results: Readonly<BuildResult>[];
  counts: RunCounts;
}

/** Running view of a scheduler. */
export interface SchedulerSnapshot {
  pending: number;
  running: string[];
  counts: RunCounts;
  stopping: boolean;
}

/** Count results by status. */
export function countResults(results: ReadonlyArray<Pick<BuildResult, 'status'>>): RunCounts {
  const counts: RunCounts = { total: results.length, succeeded: 0, failed: 0, skipped: 0 };
  for (const result of results) {
    if (result.status === BuildJobStatus.Succeeded) counts.succeeded++;
    else if (result.status === BuildJobStatus.Failed) counts.failed++;
    else counts.skipped++;
  }
  return counts;
}

/**
 * Decide the aggregate status: Failed if any job failed, Canceled if the run
 * was canceled from outside and something was skipped, else Succeeded.
 */
export function aggregateStatus(counts: RunCounts, externallyCanceled: boolean): AggregateStatus {
  if (counts.failed > 0) return 'failed';
  if (externallyCanceled && counts.skipped > 0) return 'canceled';
  return 'succeeded';
}

export class JobScheduler {
  private results = new Map<string, Readonly<BuildResult>>();
  private statuses = new Map<string, BuildJobStatus>();
  private stopReason?: string;
  private active = false;
  private log: Logger;

  constructor(private runner: JobRunner, log: Logger = rootLogger) {
    this.log = log.child({ module: 'scheduler' });
  }

  snapshot(): SchedulerSnapshot {
    const ids = [...this.statuses.entries()];
    return {
      pending: ids.filter(([, status]) => status === BuildJobStatus.Pending).length,
      running: ids.filter(([, status]) => status === BuildJobStatus.Running).map(([id]) => id),
      counts: countResults([...this.results.values()]),
      stopping: this.stopReason !== undefined,
    };
  }

  async run(jobs: BuildJob[], options: SchedulerOptions): Promise<SchedulerReport> {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`);
    }
    if (this.active) {
      throw new OrchestratorError(
        createTypedError({ code: 'SCHEDULER.BUSY', message: 'Scheduler is already running a batch of jobs' }),
      );
    }

    this.active = true;
    this.results = new Map();
    this.statuses = new Map(jobs.map((job) => [job.id, BuildJobStatus.Pending]));
    this.stopReason = undefined;
    try {
      return await this.runBatch(jobs, options);
    } finally {
      this.active = false;
    }
  }

  /** Move a job through the job state machine. */
  private advance(job: BuildJob, target: BuildJobStatus): void {
    const current = this.statuses.get(job.id) ?? BuildJobStatus.Pending;
    const result = transitionJobStatus(current, target);
    if (!result.success) throw new OrchestratorError({ ...result.error, jobId: job.id });
    this.statuses.set(job.id, result.newStatus);
  }

  private async runBatch(jobs: BuildJob[], options: SchedulerOptions): Promise<SchedulerReport> {
    const token = options.token ?? NEVER_CANCELED;
    const queue = [...jobs].sort((a, b) => a.index - b.index);
    this.log.info('Scheduling jobs', {
      jobs: queue.length,
      concurrency: options.concurrency,
      policy: options.policy,
    });

    const record = (job: BuildJob, result: Readonly<BuildResult>): void => {
      this.results.set(result.jobId, result);
      if (result.status === BuildJobStatus.Failed && options.policy === 'fail-fast' && !this.stopReason) {
        this.stopReason = `fail-fast: job ${result.jobId} failed`;
        this.log.warn('Stopping after first failure', { jobId: result.jobId });
      }
      try {
        options.onResult?.(result);
      } catch (err) {
        this.log.error('Result listener threw', { job: describeJob(job), error: describeError(err) });
      }
    };

    const execute = async (job: BuildJob): Promise<Readonly<BuildResult>> => {
      try {
        return await this.runner.execute(job, token);
      } catch (err) {
        this.log.error('Executor threw instead of reporting', { job: describeJob(job), error: describeError(err) });
        return createBuildResult(job, {
          status: BuildJobStatus.Failed,
          error: createTypedError({
            code: 'SYSTEM.INTERNAL',
            message: describeError(err),
            jobId: job.id,
          }),
          completedAt: new Date().toISOString(),
        });
      }
    };

    const worker = async (): Promise<void> => {
      for (let job = queue.shift(); job; job = queue.shift()) {
        if (this.statuses.get(job.id) !== BuildJobStatus.Pending) {
          this.log.warn('Job id scheduled twice; running it once', { jobId: job.id, job: describeJob(job) });
          continue;
        }
        const reason = token.canceled ? token.reason ?? 'run canceled' : this.stopReason;
        this.advance(job, reason ? BuildJobStatus.Skipped : BuildJobStatus.Running);
        if (reason) {
          record(
            job,
            createBuildResult(job, {
              status: BuildJobStatus.Skipped,
              error: canceledBySchedulerError(job.id, reason),
              completedAt: new Date().toISOString(),
            }),
          );
          continue;
        }

        options.onJobStarted?.(job);
        const result = await execute(job);
        this.advance(job, result.status);
        record(job, result);
      }
    };

    const workers = Math.min(options.concurrency, Math.max(queue.length, 1));
    await Promise.all(Array.from({ length: workers }, () => worker()));

    const results = [...new Set(jobs.map((job) => job.id))]
      .map((id) => this.results.get(id))
      .filter((r): r is Readonly<BuildResult> => r !== undefined)
      .sort((a, b) => a.index - b.index);
    const counts = countResults(results);
    const status = aggregateStatus(counts, token.canceled);

    this.log.info('Scheduling finished', { status, ...counts });
    return { status, results, counts };
  }
}
