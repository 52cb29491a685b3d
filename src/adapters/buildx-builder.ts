/**
 * Per-architecture image builds through `docker buildx`.
 *
 * Each platform is built separately and pushed by digest only
 * (`push-by-digest=true`), so nothing is tagged until the publisher writes the
 * image index. The pushed manifest's descriptor is read back from buildx's
 * metadata file.
 */

import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { CacheReference, OCI_MANIFEST_MEDIA_TYPE, OciDescriptor, parsePlatform } from '../domain/image';
import { describeError } from '../domain/errors';
import { ImageBuilder, PlatformBuildOutput, PlatformBuildRequest, RegistryCredential } from '../engine/image-publisher';
import { logger } from '../logger';
import { CommandRunner, formatCommand } from './command-runner';

export interface BuildxImageBuilderOptions {
  dockerCommand?: string;
  /** Directory the context and recipe paths are relative to. */
  cwd?: string;
  /** Image that registers binfmt handlers for emulated architectures. */
  binfmtImage?: string;
  timeoutMs?: number;
}

const log = logger.child({ module: 'buildx-builder' });

/** Render a cache reference as a buildx `--cache-from`/`--cache-to` value. */
export function formatCacheSpec(cache: CacheReference): string {
  const parts = [`type=${cache.type}`];
  if (cache.ref) parts.push(`ref=${cache.ref}`);
  if (cache.mode) parts.push(`mode=${cache.mode}`);
  return parts.join(',');
}

/** Arguments of the `docker buildx build` call for one platform. */
export function buildxArgs(request: PlatformBuildRequest, metadataFile: string): string[] {
  const { destination } = request;
  const args = [
    'buildx',
    'build',
    '--platform',
    request.platform,
    '--file',
    request.recipe,
    '--output',
    `type=image,name=${destination.registry}/${destination.repository},push-by-digest=true,name-canonical=true,push=true`,
    '--metadata-file',
    metadataFile,
  ];
  for (const cache of request.cacheFrom) {
    args.push('--cache-from', formatCacheSpec(cache));
  }
  if (request.cacheTo) {
    args.push('--cache-to', formatCacheSpec(request.cacheTo));
  }
  for (const key of Object.keys(request.buildArgs).sort()) {
    args.push('--build-arg', `${key}=${request.buildArgs[key]}`);
  }
  args.push(request.context);
  return args;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Extract the pushed manifest descriptor from a buildx metadata document. */
export function parseBuildMetadata(raw: string): OciDescriptor | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (!isRecord(parsed)) return undefined;

  const descriptor = parsed['containerimage.descriptor'];
  if (isRecord(descriptor)) {
    const { mediaType, digest, size } = descriptor;
    if (typeof mediaType === 'string' && typeof digest === 'string' && typeof size === 'number') {
      return { mediaType, digest, size };
    }
  }

  const digest = parsed['containerimage.digest'];
  if (typeof digest === 'string') {
    return { mediaType: OCI_MANIFEST_MEDIA_TYPE, digest, size: 0 };
  }
  return undefined;
}

/** buildx marks reused steps with "CACHED" in its progress output. */
export function reportsCacheHit(output: string): boolean {
  return /^#\d+ CACHED$/m.test(output);
}

export class BuildxImageBuilder implements ImageBuilder {
  private loggedIn = new Map<string, Promise<void>>();
  private emulators = new Map<string, Promise<void>>();

  constructor(private runner: CommandRunner, private options: BuildxImageBuilderOptions = {}) {}

  async buildPlatform(request: PlatformBuildRequest): Promise<PlatformBuildOutput> {
    const docker = this.options.dockerCommand ?? 'docker';
    try {
      await this.login(request.destination.registry, request.credential);
      if (request.emulated) await this.setUpEmulation(request.platform);
    } catch (err) {
      return { ok: false, message: describeError(err), output: '' };
    }

    const scratch = await mkdtemp(path.join(os.tmpdir(), 'forge-buildx-'));
    const metadataFile = path.join(scratch, 'metadata.json');
    try {
      const args = buildxArgs(request, metadataFile);
      log.info('Building platform image', { platform: request.platform, command: formatCommand(docker, args) });
      const result = await this.runner.run({
        command: docker,
        args,
        cwd: this.options.cwd,
        timeoutMs: this.options.timeoutMs,
      });

      if (result.timedOut) {
        return { ok: false, message: `build timed out after ${this.options.timeoutMs}ms`, output: result.output };
      }
      if (result.exitCode !== 0) {
        return { ok: false, message: `docker buildx exited with code ${result.exitCode}`, output: result.output };
      }

      const manifest = parseBuildMetadata(await readFile(metadataFile, 'utf8'));
      if (!manifest) {
        return { ok: false, message: 'buildx metadata did not report a pushed manifest', output: result.output };
      }
      return { ok: true, manifest, cacheHit: reportsCacheHit(result.output), output: result.output };
    } finally {
      await rm(scratch, { recursive: true, force: true });
    }
  }

  private login(registry: string, credential: RegistryCredential): Promise<void> {
    const key = `${registry}\n${credential.username}`;
    const existing = this.loggedIn.get(key);
    if (existing) return existing;

    const pending = this.runner
      .run({
        command: this.options.dockerCommand ?? 'docker',
        args: ['login', registry, '--username', credential.username, '--password-stdin'],
        input: credential.secret,
      })
      .then((result) => {
        if (result.exitCode !== 0) {
          throw new Error(`docker login to ${registry} failed with code ${result.exitCode}`);
        }
      })
      .catch((err: unknown) => {
        this.loggedIn.delete(key);
        throw err;
      });
    this.loggedIn.set(key, pending);
    return pending;
  }

  private setUpEmulation(platform: string): Promise<void> {
    const arch = parsePlatform(platform)?.architecture ?? platform;
    const existing = this.emulators.get(arch);
    if (existing) return existing;

    const pending = this.runner
      .run({
        command: this.options.dockerCommand ?? 'docker',
        args: ['run', '--privileged', '--rm', this.options.binfmtImage ?? 'tonistiigi/binfmt', '--install', arch],
      })
      .then((result) => {
        if (result.exitCode !== 0) {
          throw new Error(`emulator setup for ${arch} failed with code ${result.exitCode}`);
        }
      })
      .catch((err: unknown) => {
        this.emulators.delete(arch);
        throw err;
      });
    this.emulators.set(arch, pending);
    return pending;
  }
}
