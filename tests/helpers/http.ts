import express from 'express';
import { AddressInfo } from 'net';
import path from 'path';
import { OrchestratorConfig, loadConfig } from '../../src/config';
import { AppContext, createApp, createAppContext, readPipelineFile, seedPipelines } from '../../src/server';
import { PipelineRun } from '../../src/domain/run';
import { isTerminalRunStatus } from '../../src/engine/state-machine';
import { FakeJobRunner, ImagePublisherFakes, createImagePublisherFakes } from './fakes';
import { flushPromises } from './fixtures';

export const PIPELINES_FILE = path.join(__dirname, '..', '..', 'config', 'pipelines.json');

export function testConfig(overrides: Partial<OrchestratorConfig> = {}): OrchestratorConfig {
  return { ...loadConfig({}), pipelinesFile: PIPELINES_FILE, hostPlatform: 'linux/amd64', ...overrides };
}

export interface TestServer {
  ctx: AppContext;
  app: express.Application;
  executor: FakeJobRunner;
  image: ImagePublisherFakes;
}

/** An app over the bundled pipeline definitions, with in-memory builders. */
export async function createTestServer(): Promise<TestServer> {
  const executor = new FakeJobRunner();
  const image = createImagePublisherFakes();
  const ctx = createAppContext(testConfig(), { executor, imagePublisher: image.publisher });
  await seedPipelines(ctx, readPipelineFile(ctx.config.pipelinesFile));
  return { ctx, app: createApp(ctx), executor, image };
}

/** Issue one request against an ephemeral listener. Strings are sent as raw bodies. */
export async function request(
  app: express.Application,
  method: string,
  urlPath: string,
  body?: unknown,
  headers?: Record<string, string>,
): Promise<{ status: number; body: unknown }> {
  const server = app.listen(0);
  try {
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address: AddressInfo | string | null = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;
    const init: RequestInit = {
      method,
      headers: { 'Content-Type': 'application/json', ...headers },
    };
    if (body !== undefined) init.body = typeof body === 'string' ? body : JSON.stringify(body);

    const res = await fetch(`http://127.0.0.1:${port}${urlPath}`, init);
    return { status: res.status, body: await res.json() };
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

/** Wait for a background run to reach a terminal state. */
export async function waitForRun(ctx: AppContext, runId: string): Promise<PipelineRun> {
  for (let i = 0; i < 200; i++) {
    const run = await ctx.store.runs.getById(runId);
    if (run && isTerminalRunStatus(run.status)) return run;
    await flushPromises();
  }
  throw new Error(`run ${runId} did not finish`);
}
