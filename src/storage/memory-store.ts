/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Every value going
 * in or out is deep-copied so callers never share nested state (run
 * results, pipeline catalogs) with the store.
 */

import { PipelineEvent, PipelineEventType } from '../domain/events';
import { PipelineDefinition } from '../domain/pipeline';
import { PipelineRun } from '../domain/run';
import { EventStore, ListOptions, PipelineStore, RunStore, Store } from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryPipelineStore implements PipelineStore {
  private data = new Map<string, PipelineDefinition>();

  async put(pipeline: PipelineDefinition): Promise<PipelineDefinition> {
    this.data.set(pipeline.id, deepCopy(pipeline));
    return deepCopy(pipeline);
  }

  async getById(id: string): Promise<PipelineDefinition | null> {
    const pipeline = this.data.get(id);
    return pipeline ? deepCopy(pipeline) : null;
  }

  async list(options?: ListOptions): Promise<PipelineDefinition[]> {
    const items = [...this.data.values()].sort((a, b) => a.id.localeCompare(b.id));
    return applyListOptions(items, options).map(deepCopy);
  }

  async count(): Promise<number> {
    return this.data.size;
  }
}

class MemoryRunStore implements RunStore {
  private data = new Map<string, PipelineRun>();
  /** Insertion order, used for "most recent first" listings. */
  private order: string[] = [];

  async create(run: PipelineRun): Promise<PipelineRun> {
    this.data.set(run.id, deepCopy(run));
    this.order.push(run.id);
    return deepCopy(run);
  }

  async getById(id: string): Promise<PipelineRun | null> {
    const run = this.data.get(id);
    return run ? deepCopy(run) : null;
  }

  async update(id: string, updates: Partial<PipelineRun>): Promise<PipelineRun | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated: PipelineRun = {
      ...existing,
      ...deepCopy(updates),
      id: existing.id,
      updatedAt: new Date().toISOString(),
    };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async listByPipeline(pipelineId: string, options?: ListOptions): Promise<PipelineRun[]> {
    const items: PipelineRun[] = [];
    for (let i = this.order.length - 1; i >= 0; i--) {
      const run = this.data.get(this.order[i]);
      if (run && run.pipelineId === pipelineId) items.push(run);
    }
    return applyListOptions(items, options).map(deepCopy);
  }
}

class MemoryEventStore implements EventStore {
  private data: PipelineEvent[] = [];

  async create(event: PipelineEvent): Promise<PipelineEvent> {
    this.data.push(deepCopy(event));
    return deepCopy(event);
  }

  async listByRun(
    runId: string,
    options?: ListOptions & { eventTypes?: PipelineEventType[] },
  ): Promise<PipelineEvent[]> {
    const types = options?.eventTypes;
    const items = this.data.filter(
      (e) => e.runId === runId && (!types || types.length === 0 || types.includes(e.type)),
    );
    return applyListOptions(items, options).map(deepCopy);
  }
}

/** Create a complete in-memory store. */
export function createMemoryStore(): Store {
  return {
    pipelines: new MemoryPipelineStore(),
    runs: new MemoryRunStore(),
    events: new MemoryEventStore(),
  };
}
