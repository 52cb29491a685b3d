/**
 * Run-time event publisher.
 *
 * Persists versioned run events and delivers them to in-process
 * subscribers (the CLI progress printer, tests, log shippers).
 */

import { v4 as uuid } from 'uuid';
import { PipelineEvent, PipelineEventType, EventSubscription } from '../domain/events';
import { PipelineRun } from '../domain/run';
import { Store } from '../storage/store';
import { logger } from '../logger';

const EVENT_SCHEMA_VERSION = '1.0.0';

export class EventPublisher {
  private subscriptions: EventSubscription[] = [];
  private log = logger.child({ module: 'event-publisher' });

  constructor(private store: Store) {}

  /** Publish a run-level event. */
  async publishRunEvent(
    run: PipelineRun,
    type: PipelineEventType,
    payload: Record<string, unknown> = {},
  ): Promise<PipelineEvent> {
    return this.publishEvent({
      id: `evt_${uuid()}`,
      type,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      runId: run.id,
      pipelineId: run.pipelineId,
      payload: {
        status: run.status,
        counts: run.counts,
        error: run.error,
        ...payload,
      },
    });
  }

  /** Publish a job-level event. */
  async publishJobEvent(
    run: PipelineRun,
    jobId: string,
    type: PipelineEventType,
    payload: Record<string, unknown>,
  ): Promise<PipelineEvent> {
    return this.publishEvent({
      id: `evt_${uuid()}`,
      type,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      runId: run.id,
      pipelineId: run.pipelineId,
      jobId,
      payload,
    });
  }

  /** Persist an event and deliver it to matching subscribers. */
  async publishEvent(event: PipelineEvent): Promise<PipelineEvent> {
    await this.store.events.create(event);

    for (const sub of this.subscriptions) {
      if (this.matchesSubscription(event, sub)) {
        try {
          sub.callback(event);
        } catch (err) {
          // A broken subscriber must not affect the run or other subscribers.
          this.log.warn('Event subscriber threw', {
            subscriptionId: sub.id,
            eventType: event.type,
            error: err instanceof Error ? err.message : String(err),
          });
        }
      }
    }

    return event;
  }

  /** Subscribe to events. Returns an unsubscribe function. */
  subscribe(subscription: EventSubscription): () => void {
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  /** Query events of a run. */
  async getEventsByRun(runId: string, eventTypes?: PipelineEventType[]): Promise<PipelineEvent[]> {
    return this.store.events.listByRun(runId, { eventTypes, limit: Number.MAX_SAFE_INTEGER });
  }

  private matchesSubscription(event: PipelineEvent, sub: EventSubscription): boolean {
    if (sub.runId && event.runId !== sub.runId) return false;
    if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) return false;
    return true;
  }
}
