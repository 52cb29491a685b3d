/**
 * Run-time event domain model.
 *
 * Events are emitted as stable, versioned records for downstream
 * consumers (the HTTP event feed, log shippers, dashboards).
 */

/** Event types emitted by the orchestrator. */
export const PIPELINE_EVENT_TYPES = [
  'run.created',
  'run.started',
  'run.succeeded',
  'run.failed',
  'run.canceled',
  'combination.rejected',
  'job.started',
  'job.succeeded',
  'job.failed',
  'job.skipped',
  'publish.state-changed',
  'publish.platform-completed',
] as const;

export type PipelineEventType = (typeof PIPELINE_EVENT_TYPES)[number];

export function isPipelineEventType(value: string): value is PipelineEventType {
  return PIPELINE_EVENT_TYPES.some((type) => type === value);
}

export interface PipelineEvent {
  id: string;
  type: PipelineEventType;
  /** Event schema version for forward compatibility. */
  schemaVersion: string;
  timestamp: string;
  runId: string;
  pipelineId: string;
  jobId?: string;
  /** Event-specific payload. */
  payload: Record<string, unknown>;
}

/** Event stream subscription. */
export interface EventSubscription {
  id: string;
  /** Only deliver events of this run. */
  runId?: string;
  /** Filter by event types. */
  eventTypes?: PipelineEventType[];
  /** Callback for event delivery. */
  callback: (event: PipelineEvent) => void;
}
