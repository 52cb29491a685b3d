/**
 * Build Executor — runs one build job in one isolated environment.
 *
 * The executor acquires an environment for the job's target, installs the
 * toolchain and packages the target and selected toggles need, hands the
 * feature selection to the build driver and reports a frozen BuildResult.
 * The environment is released on every exit path. Failures are reported,
 * never retried: a combination that fails to build fails the same way again.
 */

import {
  TypedError,
  buildFailedError,
  buildTimeoutError,
  canceledBySchedulerError,
  createTypedError,
  describeError,
  environmentAcquisitionError,
  toolInstallError,
} from '../domain/errors';
import { ArtifactReference, BuildJob, BuildJobStatus, BuildResult, createBuildResult, describeJob } from '../domain/job';
import { Target } from '../domain/target';
import { Logger, logger as rootLogger } from '../logger';
import { CancellationToken } from './cancellation';

/** An isolated, exclusively owned place to run one build. */
export interface BuildEnvironment {
  id: string;
  /** Scratch directory private to this environment. */
  workDir: string;
  target: Readonly<Target>;
}

/** Hands out and reclaims build environments. */
export interface EnvironmentProvider {
  acquire(job: BuildJob): Promise<BuildEnvironment>;
  release(environment: BuildEnvironment): Promise<void>;
}

/** Something a build needs installed before it runs. */
export type ToolRequest =
  | { kind: 'toolchain'; toolchain: string; components: string[]; crossTarget?: string }
  | { kind: 'package'; name: string };

export type InstallResult = { ok: true } | { ok: false; message: string };

/** Installs tools into an environment. Implementations are idempotent. */
export interface ToolchainInstaller {
  ensureInstalled(tool: ToolRequest, environment: BuildEnvironment): Promise<InstallResult>;
}

/** A concrete toolchain command for one job. */
export interface BuildInvocation {
  command: string;
  args: string[];
  cwd: string;
  env: Record<string, string>;
}

export interface BuildOutcome {
  exitCode: number | null;
  /** Combined toolchain output. */
  output: string;
  timedOut: boolean;
  artifact?: ArtifactReference;
}

/** Turns a feature selection into a toolchain invocation and runs it. */
export interface BuildDriver {
  /** Materialise the job's feature selection as a toolchain invocation. */
  describe(job: BuildJob, environment: BuildEnvironment): BuildInvocation;
  run(
    invocation: BuildInvocation,
    environment: BuildEnvironment,
    options: { timeoutMs?: number },
  ): Promise<BuildOutcome>;
}

export interface BuildExecutorDeps {
  environments: EnvironmentProvider;
  installer: ToolchainInstaller;
  driver: BuildDriver;
}

export interface BuildExecutorConfig {
  /** Kill a build that runs longer than this. Undefined means no limit. */
  timeoutMs?: number;
  /** Keep at most this many trailing characters of toolchain output. */
  diagnosticsLimit: number;
}

const DEFAULT_CONFIG: BuildExecutorConfig = {
  diagnosticsLimit: 64 * 1024,
};

/** Anything that can run a job to a result; the scheduler depends on this. */
export interface JobRunner {
  execute(job: BuildJob, token: CancellationToken): Promise<Readonly<BuildResult>>;
}

/** Keep the tail of a long output, marking the cut. */
export function tailDiagnostics(output: string, limit: number): string {
  if (output.length <= limit) return output;
  const dropped = output.length - limit;
  return `[... ${dropped} characters truncated ...]\n${output.slice(-limit)}`;
}

/** List the tools a job needs, in install order. */
export function requiredTools(job: BuildJob): ToolRequest[] {
  const { target } = job;
  const tools: ToolRequest[] = [
    {
      kind: 'toolchain',
      toolchain: target.toolchain,
      components: [...(target.components ?? [])],
      crossTarget: target.crossTarget ? target.toolchain : undefined,
    },
  ];
  const packages = [...(target.packages ?? []), ...job.extraPackages];
  for (const name of [...new Set(packages)]) {
    tools.push({ kind: 'package', name });
  }
  return tools;
}

function toolLabel(tool: ToolRequest): string {
  return tool.kind === 'toolchain' ? `toolchain ${tool.toolchain}` : tool.name;
}

export class BuildExecutor implements JobRunner {
  private config: BuildExecutorConfig;
  private log: Logger;

  constructor(private deps: BuildExecutorDeps, config?: Partial<BuildExecutorConfig>, log: Logger = rootLogger) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.log = log.child({ module: 'build-executor' });
  }

  async execute(job: BuildJob, token: CancellationToken): Promise<Readonly<BuildResult>> {
    const startedAt = new Date().toISOString();
    const jobLog = this.log.child({ jobId: job.id, target: job.target.id, features: job.combinationKey });

    const skipped = (): Readonly<BuildResult> => {
      jobLog.info('Job canceled before completion', { reason: token.reason });
      return createBuildResult(job, {
        status: BuildJobStatus.Skipped,
        error: canceledBySchedulerError(job.id, token.reason ?? 'canceled'),
        startedAt,
        completedAt: new Date().toISOString(),
      });
    };

    const failed = (error: TypedError, diagnostics?: string): Readonly<BuildResult> => {
      const completedAt = new Date().toISOString();
      jobLog.warn('Job failed', { code: error.code, message: error.message });
      return createBuildResult(job, {
        status: BuildJobStatus.Failed,
        error,
        diagnostics,
        startedAt,
        completedAt,
        durationMs: Date.parse(completedAt) - Date.parse(startedAt),
      });
    };

    if (token.canceled) return skipped();

    let environment: BuildEnvironment;
    try {
      environment = await this.deps.environments.acquire(job);
    } catch (err) {
      return failed(environmentAcquisitionError(job.id, describeError(err)));
    }
    jobLog.debug('Environment acquired', { environmentId: environment.id, workDir: environment.workDir });

    try {
      for (const tool of requiredTools(job)) {
        if (token.canceled) return skipped();
        const installed = await this.deps.installer.ensureInstalled(tool, environment);
        if (!installed.ok) {
          return failed(toolInstallError(job.id, toolLabel(tool), installed.message));
        }
      }

      if (token.canceled) return skipped();

      const invocation = this.deps.driver.describe(job, environment);
      jobLog.info('Build started', { command: [invocation.command, ...invocation.args].join(' ') });
      const outcome = await this.deps.driver.run(invocation, environment, { timeoutMs: this.config.timeoutMs });
      const diagnostics = tailDiagnostics(outcome.output, this.config.diagnosticsLimit);

      if (outcome.timedOut) {
        return failed(buildTimeoutError(job.id, this.config.timeoutMs ?? 0), diagnostics);
      }
      if (outcome.exitCode !== 0) {
        return failed(buildFailedError(job.id, outcome.exitCode, diagnostics), diagnostics);
      }

      const completedAt = new Date().toISOString();
      jobLog.info('Build succeeded', { artifact: outcome.artifact?.location });
      return createBuildResult(job, {
        status: BuildJobStatus.Succeeded,
        artifact: outcome.artifact,
        diagnostics,
        startedAt,
        completedAt,
        durationMs: Date.parse(completedAt) - Date.parse(startedAt),
      });
    } catch (err) {
      return failed(
        createTypedError({
          code: 'BUILD.CRASHED',
          message: `Build driver crashed: ${describeError(err)}`,
          jobId: job.id,
        }),
      );
    } finally {
      await this.releaseEnvironment(environment, job, jobLog);
    }
  }

  private async releaseEnvironment(environment: BuildEnvironment, job: BuildJob, jobLog: Logger): Promise<void> {
    try {
      await this.deps.environments.release(environment);
      jobLog.debug('Environment released', { environmentId: environment.id });
    } catch (err) {
      // The result already describes the build; a leaked environment is an operator concern.
      jobLog.error('Failed to release build environment', {
        environmentId: environment.id,
        job: describeJob(job),
        error: describeError(err),
      });
    }
  }
}
