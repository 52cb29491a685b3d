/**
 * Run, job and publish state machines.
 *
 * Enforces valid state transitions, producing typed errors on invalid ones.
 */

import { RunStatus, VALID_RUN_TRANSITIONS } from '../domain/run';
import { BuildJobStatus, VALID_JOB_TRANSITIONS } from '../domain/job';
import { PublishState, VALID_PUBLISH_TRANSITIONS } from '../domain/image';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export type TransitionResult<S> =
  | { success: true; newStatus: S }
  | { success: false; error: TypedError };

function transition<S extends string>(
  table: Record<S, S[]>,
  code: string,
  label: string,
  current: S,
  target: S,
): TransitionResult<S> {
  const validTargets = table[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code,
        message: `Invalid ${label} state transition: ${current} -> ${target}`,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Attempt a run state transition. */
export function transitionRunStatus(current: RunStatus, target: RunStatus): TransitionResult<RunStatus> {
  return transition(VALID_RUN_TRANSITIONS, 'RUN.INVALID_TRANSITION', 'run', current, target);
}

/** Attempt a build job state transition. */
export function transitionJobStatus(current: BuildJobStatus, target: BuildJobStatus): TransitionResult<BuildJobStatus> {
  return transition(VALID_JOB_TRANSITIONS, 'JOB.INVALID_TRANSITION', 'job', current, target);
}

/** Attempt a publish state transition. */
export function transitionPublishState(current: PublishState, target: PublishState): TransitionResult<PublishState> {
  return transition(VALID_PUBLISH_TRANSITIONS, 'PUBLISH.INVALID_TRANSITION', 'publish', current, target);
}

/** Check if a run status is terminal. */
export function isTerminalRunStatus(status: RunStatus): boolean {
  return (
    status === RunStatus.Succeeded ||
    status === RunStatus.Failed ||
    status === RunStatus.Canceled
  );
}

/** Check if a job status is terminal. */
export function isTerminalJobStatus(status: BuildJobStatus): boolean {
  return VALID_JOB_TRANSITIONS[status].length === 0;
}
