/**
 * Pipeline API routes.
 *
 * GET  /pipelines                 — List pipeline definitions
 * GET  /pipelines/:pipelineId      — Get one definition
 * POST /pipelines/:pipelineId/expand — Preview a matrix's jobs and rejections
 * POST /pipelines/:pipelineId/runs   — Trigger a run (202; runs in the background)
 */

import { Router } from 'express';
import { describeError, notFoundError, validationError } from '../domain/errors';
import { FAILURE_POLICIES } from '../domain/pipeline';
import { TriggerRunInput } from '../domain/run';
import { PipelineRunner, expandPipeline } from '../engine/pipeline-runner';
import { Store } from '../storage/store';
import { logger } from '../logger';
import { sendCaught, sendError } from './middleware';

const log = logger.child({ module: 'api.pipelines' });

type TriggerBody = { ok: true; value: Omit<TriggerRunInput, 'pipelineId'> } | { ok: false; message: string };

/** Validate the optional trigger body `{ policy?, concurrency? }`. */
export function parseTriggerBody(body: unknown): TriggerBody {
  if (body === undefined || body === null) return { ok: true, value: {} };
  if (typeof body !== 'object' || Array.isArray(body)) return { ok: false, message: 'body must be an object' };

  const value: Omit<TriggerRunInput, 'pipelineId'> = {};
  if ('policy' in body && body.policy !== undefined) {
    const rawPolicy = body.policy;
    const policy = FAILURE_POLICIES.find((p) => p === rawPolicy);
    if (!policy) return { ok: false, message: `policy must be one of ${FAILURE_POLICIES.join(', ')}` };
    value.policy = policy;
  }
  if ('concurrency' in body && body.concurrency !== undefined) {
    if (typeof body.concurrency !== 'number') return { ok: false, message: 'concurrency must be a number' };
    value.concurrency = body.concurrency;
  }
  return { ok: true, value };
}

export function createPipelineRoutes(store: Store, runner: PipelineRunner): Router {
  const router = Router();

  router.get('/', async (_req, res) => {
    try {
      const pipelines = await store.pipelines.list();
      res.json({
        pipelines: pipelines.map((p) => ({
          id: p.id,
          name: p.name,
          kind: p.kind,
          description: p.description,
        })),
      });
    } catch (err) {
      sendCaught(res, err, 'Failed to list pipelines');
    }
  });

  router.get('/:pipelineId', async (req, res) => {
    try {
      const pipeline = await store.pipelines.getById(req.params.pipelineId);
      if (!pipeline) {
        sendError(res, notFoundError('Pipeline', req.params.pipelineId));
        return;
      }
      res.json({ pipeline });
    } catch (err) {
      sendCaught(res, err, 'Failed to fetch pipeline');
    }
  });

  router.post('/:pipelineId/expand', async (req, res) => {
    try {
      const pipeline = await store.pipelines.getById(req.params.pipelineId);
      if (!pipeline) {
        sendError(res, notFoundError('Pipeline', req.params.pipelineId));
        return;
      }
      if (pipeline.kind !== 'matrix') {
        sendError(res, validationError(`Pipeline "${pipeline.id}" is not a build matrix`, { kind: pipeline.kind }));
        return;
      }
      const { jobs, rejections } = expandPipeline(pipeline);
      res.json({
        jobs: jobs.map((job) => ({
          id: job.id,
          index: job.index,
          targetId: job.target.id,
          combination: job.combination,
          noDefaultFeatures: job.noDefaultFeatures,
        })),
        rejections,
      });
    } catch (err) {
      sendCaught(res, err, 'Matrix expansion failed');
    }
  });

  router.post('/:pipelineId/runs', async (req, res) => {
    try {
      const body = parseTriggerBody(req.body);
      if (!body.ok) {
        sendError(res, validationError(body.message));
        return;
      }

      const run = await runner.createRun({ pipelineId: req.params.pipelineId, ...body.value });

      // Execute asynchronously; the outcome is recorded on the run.
      runner.executeRun(run.id).catch((err: unknown) => {
        log.error('Background run execution failed', { runId: run.id, error: describeError(err) });
      });

      res.status(202).json({ run });
    } catch (err) {
      sendCaught(res, err, 'Run creation failed');
    }
  });

  return router;
}
