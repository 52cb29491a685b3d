/**
 * Storage layer interfaces.
 *
 * Defines the contract for data persistence with pluggable backends.
 */

import { PipelineEvent, PipelineEventType } from '../domain/events';
import { PipelineDefinition } from '../domain/pipeline';
import { PipelineRun } from '../domain/run';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Store interface for pipeline definitions. */
export interface PipelineStore {
  /** Insert or replace a definition by id. */
  put(pipeline: PipelineDefinition): Promise<PipelineDefinition>;
  getById(id: string): Promise<PipelineDefinition | null>;
  list(options?: ListOptions): Promise<PipelineDefinition[]>;
  count(): Promise<number>;
}

/** Store interface for pipeline runs. */
export interface RunStore {
  create(run: PipelineRun): Promise<PipelineRun>;
  getById(id: string): Promise<PipelineRun | null>;
  update(id: string, run: Partial<PipelineRun>): Promise<PipelineRun | null>;
  /** Most recent first. */
  listByPipeline(pipelineId: string, options?: ListOptions): Promise<PipelineRun[]>;
}

/** Store interface for run events. */
export interface EventStore {
  create(event: PipelineEvent): Promise<PipelineEvent>;
  /** Events of a run in emission order. */
  listByRun(runId: string, options?: ListOptions & { eventTypes?: PipelineEventType[] }): Promise<PipelineEvent[]>;
}

/** Composite store interface. */
export interface Store {
  pipelines: PipelineStore;
  runs: RunStore;
  events: EventStore;
}
