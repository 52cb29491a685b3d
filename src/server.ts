/**
 * Express server configuration.
 *
 * Assembles the orchestrator's services from configuration and mounts the
 * API surface. Every collaborator that touches the outside world (processes,
 * registries) can be replaced through AppContextOverrides.
 */

import express from 'express';
import { readFileSync } from 'fs';
import { OrchestratorConfig } from './config';
import { OrchestratorError, createTypedError, describeError } from './domain/errors';
import { PipelineDefinition } from './domain/pipeline';
import { EventPublisher } from './data-plane/publisher';
import { BuildExecutor, JobRunner } from './engine/build-executor';
import { ImagePublisher } from './engine/image-publisher';
import { PipelineRunner } from './engine/pipeline-runner';
import { parsePipelineDefinitions } from './matrix/schema';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { BuildxImageBuilder } from './adapters/buildx-builder';
import { CargoBuildDriver } from './adapters/cargo-driver';
import { CommandRunner, ProcessCommandRunner } from './adapters/command-runner';
import { EnvCredentialProvider } from './adapters/env-credentials';
import { FsContextSource } from './adapters/fs-context';
import { TempDirEnvironmentProvider } from './adapters/local-environment';
import { SystemPackageInstaller } from './adapters/package-installer';
import { FetchFn, HttpRegistryClient } from './adapters/registry-client';
import { errorHandler, requestLogger } from './api/middleware';
import { createPipelineRoutes } from './api/pipelines';
import { createRunRoutes } from './api/runs';
import { logger } from './logger';

const VERSION = '0.1.0';
const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  config: OrchestratorConfig;
  store: Store;
  publisher: EventPublisher;
  runner: PipelineRunner;
}

export interface AppContextOverrides {
  store?: Store;
  commandRunner?: CommandRunner;
  executor?: JobRunner;
  imagePublisher?: ImagePublisher;
  fetch?: FetchFn;
}

/** Create the application context with all services. */
export function createAppContext(config: OrchestratorConfig, overrides: AppContextOverrides = {}): AppContext {
  const store = overrides.store ?? createMemoryStore();
  const publisher = new EventPublisher(store);
  const commands = overrides.commandRunner ?? new ProcessCommandRunner();

  const executor =
    overrides.executor ??
    new BuildExecutor(
      {
        environments: new TempDirEnvironmentProvider({ workRoot: config.workDir }),
        installer: new SystemPackageInstaller(commands, { useSudo: config.useSudo }),
        driver: new CargoBuildDriver(commands, { sourceDir: config.sourceDir }),
      },
      { timeoutMs: config.buildTimeoutMs, diagnosticsLimit: config.diagnosticsLimit },
    );

  const imagePublisher =
    overrides.imagePublisher ??
    new ImagePublisher(
      {
        credentials: new EnvCredentialProvider(config.registryUsername, config.registryToken),
        context: new FsContextSource(config.sourceDir),
        builder: new BuildxImageBuilder(commands, { cwd: config.sourceDir, timeoutMs: config.buildTimeoutMs }),
        registry: new HttpRegistryClient({ fetch: overrides.fetch }),
      },
      { hostPlatform: config.hostPlatform },
    );

  const runner = new PipelineRunner(
    { store, publisher, executor, imagePublisher },
    { defaultConcurrency: config.concurrency, policyOverride: config.policy },
  );

  return { config, store, publisher, runner };
}

/** Read and validate a pipeline definitions document. */
export function readPipelineFile(file: string): PipelineDefinition[] {
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(file, 'utf8'));
  } catch (err) {
    throw new OrchestratorError(
      createTypedError({
        code: 'VALIDATION.PIPELINES_UNREADABLE',
        message: `Could not read pipeline definitions from ${file}: ${describeError(err)}`,
      }),
    );
  }

  const result = parsePipelineDefinitions(document);
  if (!result.valid) {
    throw new OrchestratorError(
      createTypedError({
        code: 'VALIDATION.PIPELINES_INVALID',
        message: `${file}: ${result.errors.map((e) => e.message).join('; ')}`,
        details: { errors: result.errors },
      }),
    );
  }
  return result.pipelines;
}

/** Register pipeline definitions with the store. */
export async function seedPipelines(ctx: AppContext, pipelines: PipelineDefinition[]): Promise<void> {
  for (const pipeline of pipelines) {
    await ctx.store.pipelines.put(pipeline);
  }
  logger.info('Pipelines loaded', { pipelines: pipelines.map((p) => p.id) });
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  app.get('/health', async (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptimeMs: Date.now() - startTime,
      storage: 'memory',
      pipelines: await ctx.store.pipelines.count(),
      activeRuns: ctx.runner.activeRunCount(),
      hostPlatform: ctx.config.hostPlatform,
    });
  });

  const v1 = express.Router();
  v1.use('/pipelines', createPipelineRoutes(ctx.store, ctx.runner));
  v1.use('/runs', createRunRoutes(ctx.store, ctx.runner));
  app.use('/api/v1', v1);

  app.use(errorHandler);

  return app;
}
