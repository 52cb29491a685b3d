/**
 * Build job domain model.
 *
 * A job is one (target, feature combination) pair of an expanded matrix.
 * It is created by the expander, consumed exactly once by a build executor,
 * and ends in one of Succeeded, Failed or Skipped.
 */

import { TypedError } from './errors';
import { Target } from './target';

/** Build job lifecycle states. */
export enum BuildJobStatus {
  Pending = 'pending',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Skipped = 'skipped',
}

/** Valid state transitions for build jobs. */
export const VALID_JOB_TRANSITIONS: Record<BuildJobStatus, BuildJobStatus[]> = {
  [BuildJobStatus.Pending]: [BuildJobStatus.Running, BuildJobStatus.Skipped],
  [BuildJobStatus.Running]: [BuildJobStatus.Succeeded, BuildJobStatus.Failed, BuildJobStatus.Skipped],
  [BuildJobStatus.Succeeded]: [],
  [BuildJobStatus.Failed]: [],
  [BuildJobStatus.Skipped]: [],
};

export interface BuildJob {
  /** Stable hash of target id and canonical combination. */
  id: string;
  /** Position in canonical matrix order. */
  index: number;
  target: Readonly<Target>;
  /** Canonical combination, base features included. */
  combination: string[];
  /** Canonical key (`a,b,c`). */
  combinationKey: string;
  /** Whether the toolchain's default features are switched off. */
  noDefaultFeatures: boolean;
  /** Toolchain packages this job needs beyond the target's own (from toggle `installs`). */
  extraPackages: string[];
}

/** Reference to what a successful build produced. */
export interface ArtifactReference {
  /** Path of the built artifact inside its environment, or a remote URI. */
  location: string;
  /** Content digest when the driver computes one. */
  digest?: string;
}

/** Outcome of a build job. Frozen once created. */
export interface BuildResult {
  jobId: string;
  index: number;
  targetId: string;
  combination: string[];
  status: BuildJobStatus.Succeeded | BuildJobStatus.Failed | BuildJobStatus.Skipped;
  artifact?: ArtifactReference;
  /** Captured toolchain output, kept verbatim (tail-bounded). */
  diagnostics?: string;
  error?: TypedError;
  startedAt?: string;
  completedAt: string;
  durationMs?: number;
}

/** A combination the validator refused for a target. */
export interface MatrixRejection {
  targetId: string;
  combination: string[];
  reason: string;
  code: string;
}

/** Create a frozen build result. */
export function createBuildResult(job: BuildJob, fields: Omit<BuildResult, 'jobId' | 'index' | 'targetId' | 'combination'>): Readonly<BuildResult> {
  return Object.freeze({
    jobId: job.id,
    index: job.index,
    targetId: job.target.id,
    combination: [...job.combination],
    ...fields,
  });
}

/** Short label used in logs and reports ("linux-x64 [a,b]"). */
export function describeJob(job: BuildJob): string {
  return `${job.target.id} [${job.combinationKey}]`;
}
