/**
 * Build environments backed by fresh scratch directories on the local host.
 *
 * Each job gets its own directory under the configured work root, removed on
 * release, so two jobs never share build output.
 */

import { mkdir, mkdtemp, rm } from 'fs/promises';
import path from 'path';
import { BuildEnvironment, EnvironmentProvider } from '../engine/build-executor';
import { BuildJob } from '../domain/job';

export interface TempDirEnvironmentOptions {
  workRoot: string;
  /** Keep directories after release, for debugging failed builds. */
  keep?: boolean;
}

export class TempDirEnvironmentProvider implements EnvironmentProvider {
  constructor(private options: TempDirEnvironmentOptions) {}

  async acquire(job: BuildJob): Promise<BuildEnvironment> {
    await mkdir(this.options.workRoot, { recursive: true });
    const workDir = await mkdtemp(path.join(this.options.workRoot, `${job.id}-`));
    return { id: path.basename(workDir), workDir, target: job.target };
  }

  async release(environment: BuildEnvironment): Promise<void> {
    if (this.options.keep) return;
    await rm(environment.workDir, { recursive: true, force: true });
  }
}
