/**
 * Build driver for cargo workspaces.
 *
 * A job's feature selection becomes `cargo build --features a,b,c`, with the
 * toolchain triple passed for cross targets and default features switched off
 * when the pipeline asks for it.
 */

import path from 'path';
import { BuildDriver, BuildEnvironment, BuildInvocation, BuildOutcome } from '../engine/build-executor';
import { BuildJob } from '../domain/job';
import { CommandRunner } from './command-runner';

export interface CargoBuildDriverOptions {
  /** Checkout the build runs in. */
  sourceDir: string;
  /** Build in release mode. */
  release?: boolean;
  /** Restrict the build to one workspace package. */
  packageName?: string;
  cargoCommand?: string;
}

export class CargoBuildDriver implements BuildDriver {
  constructor(private runner: CommandRunner, private options: CargoBuildDriverOptions) {}

  describe(job: BuildJob, environment: BuildEnvironment): BuildInvocation {
    const args = ['build'];
    if (this.options.release) args.push('--release');
    if (this.options.packageName) args.push('--package', this.options.packageName);
    if (job.target.crossTarget) args.push(`--target=${job.target.toolchain}`);
    if (job.noDefaultFeatures) args.push('--no-default-features');
    if (job.combination.length > 0) args.push('--features', job.combinationKey);

    return {
      command: this.options.cargoCommand ?? 'cargo',
      args,
      cwd: this.options.sourceDir,
      env: {
        ...job.target.env,
        CARGO_TARGET_DIR: path.join(environment.workDir, 'target'),
      },
    };
  }

  async run(
    invocation: BuildInvocation,
    environment: BuildEnvironment,
    options: { timeoutMs?: number },
  ): Promise<BuildOutcome> {
    const result = await this.runner.run({
      command: invocation.command,
      args: invocation.args,
      cwd: invocation.cwd,
      env: invocation.env,
      timeoutMs: options.timeoutMs,
    });

    const profile = this.options.release ? 'release' : 'debug';
    const outputDir = environment.target.crossTarget
      ? path.join(environment.workDir, 'target', environment.target.toolchain, profile)
      : path.join(environment.workDir, 'target', profile);

    return {
      exitCode: result.exitCode,
      output: result.output,
      timedOut: result.timedOut,
      artifact: result.exitCode === 0 && !result.timedOut ? { location: outputDir } : undefined,
    };
  }
}
