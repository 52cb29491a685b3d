/**
 * Pipeline Runner — the orchestration entry point.
 *
 * Turns a trigger ("run pipeline X") into a durable run record, drives the
 * matrix path (expand → schedule → aggregate) or the image path (publish),
 * and records results and events as they happen.
 */

import { v4 as uuid } from 'uuid';
import {
  OrchestratorError,
  TypedError,
  createTypedError,
  describeError,
  notFoundError,
  runCanceledError,
  runNotFoundError,
  validationError,
} from '../domain/errors';
import { PipelineEventType } from '../domain/events';
import { PublishState } from '../domain/image';
import { BuildJobStatus, BuildResult, describeJob } from '../domain/job';
import { ImagePipeline, MatrixPipeline } from '../domain/pipeline';
import { PipelineRun, RunStatus, TriggerRunInput } from '../domain/run';
import { EventPublisher } from '../data-plane/publisher';
import { MatrixExpansion, expandMatrix } from '../matrix/expander';
import { SCHEMA_CONSTRAINTS } from '../matrix/schema';
import { Store } from '../storage/store';
import { Logger, logger as rootLogger } from '../logger';
import { JobRunner } from './build-executor';
import { CancellationSource } from './cancellation';
import { ImagePublisher } from './image-publisher';
import { JobScheduler, SchedulerSnapshot } from './scheduler';
import { isTerminalRunStatus, transitionRunStatus } from './state-machine';

export interface PipelineRunnerDeps {
  store: Store;
  publisher: EventPublisher;
  executor: JobRunner;
  imagePublisher: ImagePublisher;
}

export interface PipelineRunnerConfig {
  /** Used when neither the trigger nor the pipeline sets a concurrency. */
  defaultConcurrency?: number;
  /** Overrides every pipeline's failure policy unless the trigger sets one. */
  policyOverride?: MatrixPipeline['policy'];
}

const JOB_EVENT_BY_STATUS: Record<BuildResult['status'], PipelineEventType> = {
  [BuildJobStatus.Succeeded]: 'job.succeeded',
  [BuildJobStatus.Failed]: 'job.failed',
  [BuildJobStatus.Skipped]: 'job.skipped',
};

/** Expand a matrix pipeline into jobs and rejections. */
export function expandPipeline(pipeline: MatrixPipeline): MatrixExpansion {
  return expandMatrix({
    catalog: pipeline.catalog,
    targets: pipeline.targets,
    combinations: pipeline.combinations,
    combinationsByTarget: pipeline.combinationsByTarget,
    baseFeatures: pipeline.baseFeatures,
    noDefaultFeatures: pipeline.noDefaultFeatures,
  });
}

export class PipelineRunner {
  private cancellations = new Map<string, CancellationSource>();
  private schedulers = new Map<string, JobScheduler>();
  /** Guard against concurrent executeRun calls on the same run. */
  private runningRuns = new Set<string>();
  private log: Logger;

  constructor(private deps: PipelineRunnerDeps, private config: PipelineRunnerConfig = {}, log: Logger = rootLogger) {
    this.log = log.child({ module: 'pipeline-runner' });
  }

  /** Create a run record for a pipeline. Nothing executes yet. */
  async createRun(input: TriggerRunInput): Promise<PipelineRun> {
    const pipeline = await this.deps.store.pipelines.getById(input.pipelineId);
    if (!pipeline) {
      throw new OrchestratorError(notFoundError('Pipeline', input.pipelineId));
    }

    if (
      input.concurrency !== undefined &&
      (!Number.isInteger(input.concurrency) || input.concurrency < 1 || input.concurrency > SCHEMA_CONSTRAINTS.maxConcurrency)
    ) {
      throw new OrchestratorError(
        validationError(`concurrency must be an integer between 1 and ${SCHEMA_CONSTRAINTS.maxConcurrency}`, {
          concurrency: input.concurrency,
        }),
      );
    }

    const now = new Date().toISOString();
    const run: PipelineRun = {
      id: `run_${uuid()}`,
      pipelineId: pipeline.id,
      kind: pipeline.kind,
      status: RunStatus.Created,
      createdAt: now,
      updatedAt: now,
      results: [],
      rejections: [],
    };
    if (pipeline.kind === 'matrix') {
      run.policy = input.policy ?? this.config.policyOverride ?? pipeline.policy;
      run.concurrency = input.concurrency ?? pipeline.concurrency ?? this.config.defaultConcurrency ?? 1;
    }

    await this.deps.store.runs.create(run);
    this.cancellations.set(run.id, new CancellationSource());
    await this.safePublishRunEvent(run, 'run.created');
    this.log.info('Run created', { runId: run.id, pipelineId: run.pipelineId, kind: run.kind });
    return run;
  }

  /** Create and execute a run, resolving with the finished run. */
  async trigger(input: TriggerRunInput): Promise<PipelineRun> {
    const run = await this.createRun(input);
    return this.executeRun(run.id);
  }

  /** Execute a created run to a terminal state. */
  async executeRun(runId: string): Promise<PipelineRun> {
    if (this.runningRuns.has(runId)) {
      throw new OrchestratorError(
        createTypedError({
          code: 'RUN.ALREADY_RUNNING',
          message: `Run "${runId}" is already being executed`,
        }),
      );
    }
    this.runningRuns.add(runId);

    try {
      return await this.executeRunInternal(runId);
    } finally {
      this.runningRuns.delete(runId);
      this.cancellations.delete(runId);
      this.schedulers.delete(runId);
    }
  }

  /** Cancel a run. Running runs stop at their executors' next safe point. */
  async cancelRun(runId: string, canceledBy: string, reason?: string): Promise<PipelineRun> {
    const run = await this.deps.store.runs.getById(runId);
    if (!run) {
      throw new OrchestratorError(runNotFoundError(runId));
    }
    if (isTerminalRunStatus(run.status)) {
      return run;
    }

    this.cancellations.get(runId)?.cancel(reason ?? 'run canceled');
    const updates: Partial<PipelineRun> = {
      canceledBy,
      canceledAt: new Date().toISOString(),
      cancelReason: reason,
    };

    if (run.status === RunStatus.Created && !this.runningRuns.has(runId)) {
      updates.status = RunStatus.Canceled;
      updates.completedAt = updates.canceledAt;
      updates.error = runCanceledError(runId, reason);
      this.cancellations.delete(runId);
    }

    const updated = (await this.deps.store.runs.update(runId, updates)) ?? run;
    this.log.info('Run cancel requested', { runId, canceledBy, reason });
    if (updated.status === RunStatus.Canceled) {
      await this.safePublishRunEvent(updated, 'run.canceled');
    }
    return updated;
  }

  /** Runs created or executing that have not reached a terminal state. */
  activeRunCount(): number {
    return this.cancellations.size;
  }

  /** Live scheduler view of a running matrix run. */
  progress(runId: string): SchedulerSnapshot | undefined {
    return this.schedulers.get(runId)?.snapshot();
  }

  private async executeRunInternal(runId: string): Promise<PipelineRun> {
    let run = await this.deps.store.runs.getById(runId);
    if (!run) {
      throw new OrchestratorError(runNotFoundError(runId));
    }
    if (run.status === RunStatus.Canceled) {
      return run;
    }

    const pipeline = await this.deps.store.pipelines.getById(run.pipelineId);
    if (!pipeline) {
      throw new OrchestratorError(notFoundError('Pipeline', run.pipelineId));
    }

    run = await this.transitionRun(run, RunStatus.Running);
    run.startedAt = new Date().toISOString();
    await this.deps.store.runs.update(run.id, { startedAt: run.startedAt });
    await this.safePublishRunEvent(run, 'run.started');

    let source = this.cancellations.get(run.id);
    if (!source) {
      source = new CancellationSource();
      this.cancellations.set(run.id, source);
    }

    try {
      return pipeline.kind === 'matrix'
        ? await this.runMatrix(run, pipeline, source)
        : await this.runImage(run, pipeline, source);
    } catch (err) {
      this.log.error('Run crashed', { runId: run.id, error: describeError(err) });
      return this.finishRun(
        run,
        RunStatus.Failed,
        createTypedError({ code: 'SYSTEM.INTERNAL', message: describeError(err), runId: run.id }),
      );
    }
  }

  private async runMatrix(run: PipelineRun, pipeline: MatrixPipeline, source: CancellationSource): Promise<PipelineRun> {
    const runLog = this.log.child({ runId: run.id, pipelineId: pipeline.id });
    const { jobs, rejections } = expandPipeline(pipeline);

    run.rejections = rejections;
    await this.deps.store.runs.update(run.id, { rejections });
    for (const rejection of rejections) {
      runLog.info('Combination rejected', { ...rejection });
      await this.safePublish(() =>
        this.deps.publisher.publishRunEvent(run, 'combination.rejected', { rejection }),
      );
    }
    if (jobs.length === 0) {
      runLog.warn('Matrix expanded to zero jobs', { rejections: rejections.length });
    }

    const scheduler = new JobScheduler(this.deps.executor, runLog);
    this.schedulers.set(run.id, scheduler);

    // Results are persisted as they arrive so the running view is queryable.
    const completed: BuildResult[] = [];
    let persisted: Promise<void> = Promise.resolve();
    const persist = (work: () => Promise<unknown>): void => {
      persisted = persisted.then(work).then(
        () => undefined,
        (err: unknown) => runLog.warn('Failed to persist progress', { error: describeError(err) }),
      );
    };

    const report = await scheduler.run(jobs, {
      concurrency: run.concurrency ?? 1,
      policy: run.policy ?? pipeline.policy,
      token: source.token,
      onJobStarted: (job) => {
        runLog.debug('Job started', { job: describeJob(job) });
        persist(() =>
          this.deps.publisher.publishJobEvent(run, job.id, 'job.started', {
            targetId: job.target.id,
            combination: job.combination,
          }),
        );
      },
      onResult: (result) => {
        completed.push(result);
        const snapshot = [...completed].sort((a, b) => a.index - b.index);
        persist(() => this.deps.store.runs.update(run.id, { results: snapshot }));
        persist(() =>
          this.deps.publisher.publishJobEvent(run, result.jobId, JOB_EVENT_BY_STATUS[result.status], {
            targetId: result.targetId,
            combination: result.combination,
            status: result.status,
            error: result.error,
            durationMs: result.durationMs,
          }),
        );
      },
    });
    await persisted;

    run.results = report.results;
    run.counts = report.counts;
    await this.deps.store.runs.update(run.id, { results: report.results, counts: report.counts });

    if (report.status === 'failed') {
      return this.finishRun(
        run,
        RunStatus.Failed,
        createTypedError({
          code: 'RUN.JOBS_FAILED',
          message: `${report.counts.failed} of ${report.counts.total} jobs failed`,
          runId: run.id,
          details: {
            failedJobs: report.results.filter((r) => r.status === BuildJobStatus.Failed).map((r) => r.jobId),
          },
        }),
      );
    }
    if (report.status === 'canceled') {
      return this.finishRun(run, RunStatus.Canceled, runCanceledError(run.id, source.token.reason));
    }
    return this.finishRun(run, RunStatus.Succeeded);
  }

  private async runImage(run: PipelineRun, pipeline: ImagePipeline, source: CancellationSource): Promise<PipelineRun> {
    // Callbacks fire synchronously from the publisher; chain their event writes.
    let published: Promise<void> = Promise.resolve();
    const emit = (type: PipelineEventType, payload: Record<string, unknown>): void => {
      published = published.then(() =>
        this.safePublish(() => this.deps.publisher.publishRunEvent(run, type, payload)),
      );
    };

    const result = await this.deps.imagePublisher.publish(pipeline.request, {
      token: source.token,
      platformConcurrency: pipeline.platformConcurrency,
      onStateChange: (state) => emit('publish.state-changed', { state }),
      onPlatformCompleted: (outcome) =>
        emit('publish.platform-completed', {
          platform: outcome.platform,
          succeeded: outcome.succeeded,
          emulated: outcome.emulated,
          cacheHit: outcome.cacheHit,
          digest: outcome.manifest?.digest,
        }),
    });
    await published;

    run.publish = result;
    await this.deps.store.runs.update(run.id, { publish: result });

    if (result.status === PublishState.Published) {
      return this.finishRun(run, RunStatus.Succeeded);
    }
    if (source.canceled && result.error?.code === 'PUBLISH.CANCELED') {
      return this.finishRun(run, RunStatus.Canceled, runCanceledError(run.id, source.token.reason));
    }
    return this.finishRun(run, RunStatus.Failed, result.error);
  }

  private async finishRun(run: PipelineRun, status: RunStatus, error?: TypedError): Promise<PipelineRun> {
    const transitioned = await this.transitionRun(run, status);
    transitioned.completedAt = new Date().toISOString();
    transitioned.error = error;
    const stored = (await this.deps.store.runs.update(run.id, {
      completedAt: transitioned.completedAt,
      error,
    })) ?? transitioned;

    const eventType: PipelineEventType =
      status === RunStatus.Succeeded ? 'run.succeeded' : status === RunStatus.Canceled ? 'run.canceled' : 'run.failed';
    await this.safePublishRunEvent(stored, eventType);
    this.log.info('Run finished', { runId: run.id, status, counts: stored.counts, error: error?.code });
    return stored;
  }

  private async transitionRun(run: PipelineRun, target: RunStatus): Promise<PipelineRun> {
    const result = transitionRunStatus(run.status, target);
    if (!result.success) {
      throw new OrchestratorError(result.error);
    }
    run.status = result.newStatus;
    run.updatedAt = new Date().toISOString();
    await this.deps.store.runs.update(run.id, { status: run.status });
    return run;
  }

  /**
   * Events are observational: a failing event write must not change the
   * outcome of the run, so it is logged and dropped.
   */
  private async safePublish(publish: () => Promise<unknown>): Promise<void> {
    try {
      await publish();
    } catch (err) {
      this.log.warn('Event publication failed', { error: describeError(err) });
    }
  }

  private async safePublishRunEvent(run: PipelineRun, eventType: PipelineEventType): Promise<void> {
    await this.safePublish(() => this.deps.publisher.publishRunEvent(run, eventType));
  }
}
