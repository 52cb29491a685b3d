/**
 * forge-matrix — build-matrix orchestration.
 *
 * Expands feature-toggle matrices into validated build jobs, runs them with
 * bounded parallelism under a failure policy, and publishes multi-architecture
 * container images with the tag moved last.
 *
 * Running this module directly starts the HTTP API.
 */

import { loadConfig } from './config';
import { createApp, createAppContext, readPipelineFile, seedPipelines } from './server';
import { logger, setLogLevel } from './logger';

// Public exports for programmatic use
export { createApp, createAppContext, readPipelineFile, seedPipelines } from './server';
export { loadConfig } from './config';
export * from './domain';
export * from './matrix';
export * from './engine';
export * from './storage';
export * from './data-plane';
export * from './adapters';

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const context = createAppContext(config);
  await seedPipelines(context, readPipelineFile(config.pipelinesFile));
  createApp(context).listen(config.port, () => {
    logger.info('Server listening', { port: config.port });
  });
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.error('Server failed to start', { error: err instanceof Error ? err.message : String(err) });
    process.exitCode = 1;
  });
}
