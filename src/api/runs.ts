/**
 * Run API routes.
 *
 * GET /runs/:runId         — Run status, results and live scheduler progress
 * POST /runs/:runId/cancel — Cancel a created or in-flight run
 * GET /runs/:runId/events  — Run events in emission order
 */

import { Request, Router } from 'express';
import { runNotFoundError } from '../domain/errors';
import { PipelineEventType, isPipelineEventType } from '../domain/events';
import { PipelineRunner } from '../engine/pipeline-runner';
import { Store } from '../storage/store';
import { sendCaught, sendError } from './middleware';

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function queryInteger(req: Request, name: string, fallback: number): number {
  const raw = queryString(req, name);
  const parsed = raw === undefined ? NaN : Number(raw);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
}

export function createRunRoutes(store: Store, runner: PipelineRunner): Router {
  const router = Router();

  router.get('/:runId', async (req, res) => {
    try {
      const run = await store.runs.getById(req.params.runId);
      if (!run) {
        sendError(res, runNotFoundError(req.params.runId));
        return;
      }
      res.json({ run, progress: runner.progress(run.id) ?? null });
    } catch (err) {
      sendCaught(res, err, 'Failed to fetch run');
    }
  });

  router.post('/:runId/cancel', async (req, res) => {
    try {
      const body: unknown = req.body;
      const reason =
        typeof body === 'object' && body !== null && 'reason' in body && typeof body.reason === 'string'
          ? body.reason
          : undefined;
      const canceledBy = req.header('x-identity-id') ?? 'api';

      const run = await runner.cancelRun(req.params.runId, canceledBy, reason);
      res.json({ run });
    } catch (err) {
      sendCaught(res, err, 'Run cancellation failed');
    }
  });

  router.get('/:runId/events', async (req, res) => {
    try {
      const run = await store.runs.getById(req.params.runId);
      if (!run) {
        sendError(res, runNotFoundError(req.params.runId));
        return;
      }

      const types = queryString(req, 'type');
      const eventTypes: PipelineEventType[] | undefined = types
        ?.split(',')
        .map((t) => t.trim())
        .filter(isPipelineEventType);
      const limit = queryInteger(req, 'limit', 100);
      const offset = queryInteger(req, 'offset', 0);

      const events = await store.events.listByRun(run.id, { eventTypes, limit, offset });
      res.json({ events, limit, offset });
    } catch (err) {
      sendCaught(res, err, 'Failed to fetch events');
    }
  });

  return router;
}
