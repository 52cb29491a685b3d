/**
 * Pipeline run domain model.
 *
 * A single triggered execution of a pipeline definition, holding the
 * per-job results (matrix) or the publish outcome (image).
 */

import { TypedError } from './errors';
import { BuildResult, MatrixRejection } from './job';
import { PublishResult } from './image';
import { FailurePolicy, PipelineKind } from './pipeline';

/** Pipeline run lifecycle states. */
export enum RunStatus {
  Created = 'created',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Canceled = 'canceled',
}

/** Valid state transitions for runs. */
export const VALID_RUN_TRANSITIONS: Record<RunStatus, RunStatus[]> = {
  [RunStatus.Created]: [RunStatus.Running, RunStatus.Canceled],
  [RunStatus.Running]: [RunStatus.Succeeded, RunStatus.Failed, RunStatus.Canceled],
  [RunStatus.Succeeded]: [],
  [RunStatus.Failed]: [],
  [RunStatus.Canceled]: [],
};

/** Result counts of a matrix run. */
export interface RunCounts {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
}

export interface PipelineRun {
  id: string;
  pipelineId: string;
  kind: PipelineKind;
  status: RunStatus;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
  /** Matrix runs: policy and concurrency in effect. */
  policy?: FailurePolicy;
  concurrency?: number;
  /** Matrix runs: results in canonical job order. */
  results: BuildResult[];
  /** Matrix runs: combinations the validator refused. */
  rejections: MatrixRejection[];
  counts?: RunCounts;
  /** Image runs: publish outcome. */
  publish?: PublishResult;
  error?: TypedError;
  canceledBy?: string;
  canceledAt?: string;
  cancelReason?: string;
}

/** Options accepted when triggering a run. */
export interface TriggerRunInput {
  pipelineId: string;
  policy?: FailurePolicy;
  concurrency?: number;
}
