#!/usr/bin/env node
/**
 * forge-matrix command line.
 *
 *   forge-matrix list
 *   forge-matrix expand <pipelineId>
 *   forge-matrix run <pipelineId> [--policy fail-fast|fail-continue] [--concurrency N]
 *   forge-matrix serve
 *
 * Reports go to stdout, structured logs to stderr. `run` exits 1 unless the
 * run succeeded.
 */

import { OrchestratorConfig, loadConfig } from './config';
import { describeError, OrchestratorError } from './domain/errors';
import { FAILURE_POLICIES, FailurePolicy } from './domain/pipeline';
import { PipelineRun, RunStatus } from './domain/run';
import { expandPipeline } from './engine/pipeline-runner';
import { AppContextOverrides, createApp, createAppContext, readPipelineFile, seedPipelines } from './server';
import { setLogLevel } from './logger';

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

interface CliOptions {
  command?: string;
  pipelineId?: string;
  policy?: FailurePolicy;
  concurrency?: number;
  help: boolean;
}

const USAGE = [
  'Usage: forge-matrix <command> [options]',
  '',
  'Commands:',
  '  list                     List configured pipelines',
  '  expand <pipelineId>      Show the jobs and rejected combinations of a matrix',
  '  run <pipelineId>         Run a pipeline and report the outcome',
  '  serve                    Start the HTTP API',
  '',
  'Options:',
  '  --policy <policy>        fail-fast or fail-continue (run)',
  '  --concurrency <n>        Jobs running at once (run)',
  '  -h, --help               Show this help',
].join('\n');

function parseArgs(args: string[]): CliOptions | string {
  const options: CliOptions = { help: false };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    switch (arg) {
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--policy': {
        const value = args[i + 1];
        const policy = FAILURE_POLICIES.find((p) => p === value);
        if (!policy) return `--policy must be one of ${FAILURE_POLICIES.join(', ')}`;
        options.policy = policy;
        i += 1;
        break;
      }
      case '--concurrency': {
        const value = Number(args[i + 1]);
        if (!Number.isInteger(value) || value < 1) return '--concurrency must be a positive integer';
        options.concurrency = value;
        i += 1;
        break;
      }
      default:
        if (arg.startsWith('-')) return `unknown option ${arg}`;
        positional.push(arg);
    }
  }

  [options.command, options.pipelineId] = positional;
  return options;
}

/** Human-readable run report, one line per job. */
export function formatRunReport(run: PipelineRun): string[] {
  const lines: string[] = [`run ${run.id} (${run.pipelineId}): ${run.status}`];
  for (const rejection of run.rejections) {
    lines.push(`  rejected   ${rejection.targetId} [${rejection.combination.join(',')}]: ${rejection.reason}`);
  }
  for (const result of run.results) {
    const detail = result.error ? `: ${result.error.message}` : '';
    lines.push(`  ${result.status.padEnd(10)} ${result.targetId} [${result.combination.join(',')}]${detail}`);
  }
  if (run.counts) {
    const { total, succeeded, failed, skipped } = run.counts;
    lines.push(`  ${total} jobs: ${succeeded} succeeded, ${failed} failed, ${skipped} skipped`);
  }
  if (run.publish) {
    if (run.publish.reference) lines.push(`  published ${run.publish.reference}`);
    for (const platform of run.publish.platforms) {
      const cache = platform.cacheHit ? ' (cached)' : '';
      lines.push(`  ${platform.succeeded ? 'built' : 'failed'}      ${platform.platform}${platform.emulated ? ' (emulated)' : ''}${cache}`);
    }
  }
  if (run.error) lines.push(`  error: ${run.error.code}: ${run.error.message}`);
  return lines;
}

/** Run the CLI and resolve with the process exit code. */
export async function runCli(
  argv: string[],
  io: CliIo,
  config: OrchestratorConfig = loadConfig(),
  overrides: AppContextOverrides = {},
): Promise<number> {
  const parsed = parseArgs(argv);
  if (typeof parsed === 'string') {
    io.err(parsed);
    io.err(USAGE);
    return 2;
  }
  if (parsed.help || !parsed.command) {
    io.out(USAGE);
    return parsed.help ? 0 : 2;
  }

  setLogLevel(config.logLevel);
  const ctx = createAppContext(config, overrides);
  try {
    await seedPipelines(ctx, readPipelineFile(config.pipelinesFile));
  } catch (err) {
    io.err(err instanceof OrchestratorError ? err.typedError.message : describeError(err));
    return 1;
  }

  switch (parsed.command) {
    case 'list': {
      for (const pipeline of await ctx.store.pipelines.list()) {
        io.out(`${pipeline.id.padEnd(16)} ${pipeline.kind.padEnd(7)} ${pipeline.name}`);
      }
      return 0;
    }

    case 'expand': {
      if (!parsed.pipelineId) {
        io.err('expand needs a pipeline id');
        return 2;
      }
      const pipeline = await ctx.store.pipelines.getById(parsed.pipelineId);
      if (!pipeline || pipeline.kind !== 'matrix') {
        io.err(`no matrix pipeline "${parsed.pipelineId}"`);
        return 1;
      }
      const { jobs, rejections } = expandPipeline(pipeline);
      for (const job of jobs) {
        io.out(`${job.id} ${job.target.id} [${job.combinationKey}]`);
      }
      for (const rejection of rejections) {
        io.out(`rejected ${rejection.targetId} [${rejection.combination.join(',')}]: ${rejection.reason}`);
      }
      return 0;
    }

    case 'run': {
      if (!parsed.pipelineId) {
        io.err('run needs a pipeline id');
        return 2;
      }
      try {
        const run = await ctx.runner.trigger({
          pipelineId: parsed.pipelineId,
          policy: parsed.policy,
          concurrency: parsed.concurrency,
        });
        formatRunReport(run).forEach((line) => io.out(line));
        return run.status === RunStatus.Succeeded ? 0 : 1;
      } catch (err) {
        io.err(err instanceof OrchestratorError ? err.typedError.message : describeError(err));
        return 1;
      }
    }

    case 'serve': {
      const app = createApp(ctx);
      await new Promise<void>((resolve, reject) => {
        const server = app.listen(config.port, () => {
          io.err(`forge-matrix listening on port ${config.port}`);
        });
        server.on('error', reject);
        server.on('close', () => resolve());
      });
      return 0;
    }

    default:
      io.err(`unknown command "${parsed.command}"`);
      io.err(USAGE);
      return 2;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2), {
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
  }).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`${describeError(err)}\n`);
      process.exitCode = 1;
    },
  );
}
