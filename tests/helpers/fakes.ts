import { buildFailedError } from '../../src/domain/errors';
import { BuildJob, BuildJobStatus, BuildResult, createBuildResult, describeJob } from '../../src/domain/job';
import { ImageDestination, OCI_MANIFEST_MEDIA_TYPE, PublishRequest } from '../../src/domain/image';
import { JobRunner } from '../../src/engine/build-executor';
import { CancellationToken } from '../../src/engine/cancellation';
import {
  AuthResult,
  ContextSource,
  CredentialProvider,
  ImageBuilder,
  ImagePublisher,
  PlatformBuildOutput,
  PlatformBuildRequest,
  RegistryClient,
  RegistryError,
  computeDigest,
} from '../../src/engine/image-publisher';

export const SECRET = 'test-secret';

interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

function deferred(): Deferred {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/**
 * Job runner that succeeds unless told otherwise. Jobs are matched by their
 * "target [combination]" label.
 */
export class FakeJobRunner implements JobRunner {
  executed: string[] = [];
  tokens: CancellationToken[] = [];
  failing = new Set<string>();
  private gates = new Map<string, Deferred>();
  private started = new Map<string, Deferred>();

  /** Hold the job until release() is called; resolves once it has started. */
  hold(label: string): Promise<void> {
    this.gates.set(label, deferred());
    const started = deferred();
    this.started.set(label, started);
    return started.promise;
  }

  release(label: string): void {
    this.gates.get(label)?.resolve();
  }

  async execute(job: BuildJob, token: CancellationToken): Promise<Readonly<BuildResult>> {
    const label = describeJob(job);
    this.executed.push(label);
    this.tokens.push(token);
    this.started.get(label)?.resolve();
    await this.gates.get(label)?.promise;

    if (this.failing.has(label)) {
      return createBuildResult(job, {
        status: BuildJobStatus.Failed,
        diagnostics: 'error[E0425]: cannot find value',
        error: buildFailedError(job.id, 101, 'error[E0425]: cannot find value'),
        completedAt: new Date().toISOString(),
      });
    }
    return createBuildResult(job, {
      status: BuildJobStatus.Succeeded,
      artifact: { location: `/work/${job.id}/target/release` },
      completedAt: new Date().toISOString(),
      durationMs: 5,
    });
  }
}

/** In-memory registry keeping manifests by digest and tags by name. */
export class FakeRegistry implements RegistryClient {
  manifests = new Map<string, Buffer>();
  tags = new Map<string, string>();
  pushedBlobs = new Set<string>();
  puts: string[] = [];
  failPutWith?: RegistryError;

  async hasManifest(_destination: ImageDestination, digest: string): Promise<boolean> {
    return this.pushedBlobs.has(digest) || this.manifests.has(digest);
  }

  async putManifest(destination: ImageDestination, reference: string, body: Buffer): Promise<string> {
    if (this.failPutWith) throw this.failPutWith;
    this.puts.push(reference);
    const digest = computeDigest(body);
    this.manifests.set(digest, body);
    if (!reference.startsWith('sha256:')) this.tags.set(`${destination.repository}:${reference}`, digest);
    return digest;
  }

  async resolveTag(destination: ImageDestination): Promise<string | undefined> {
    return this.tags.get(`${destination.repository}:${destination.tag}`);
  }
}

/** Builds every platform to a manifest digest derived from the platform name. */
export class FakeImageBuilder implements ImageBuilder {
  requests: PlatformBuildRequest[] = [];
  failing = new Map<string, string>();
  cacheHit = false;
  onBuild?: (request: PlatformBuildRequest) => void;

  constructor(private registry: FakeRegistry) {}

  async buildPlatform(request: PlatformBuildRequest): Promise<PlatformBuildOutput> {
    this.requests.push(request);
    this.onBuild?.(request);
    const failure = this.failing.get(request.platform);
    if (failure) return { ok: false, message: failure, output: `#7 ERROR: ${failure}` };
    const digest = computeDigest(Buffer.from(`manifest for ${request.platform}`));
    this.registry.pushedBlobs.add(digest);
    return {
      ok: true,
      manifest: { mediaType: OCI_MANIFEST_MEDIA_TYPE, digest, size: 512 },
      cacheHit: this.cacheHit,
      output: this.cacheHit ? '#5 CACHED' : '#5 RUN apk add',
    };
  }
}

export function makePublishRequest(overrides: Partial<PublishRequest> = {}): PublishRequest {
  return {
    context: '.',
    recipe: 'docker/alpine.Dockerfile',
    platforms: ['linux/amd64', 'linux/arm64'],
    destination: { registry: 'registry.test', repository: 'team/proxy', tag: 'latest' },
    cache: { from: [{ type: 'gha' }], to: { type: 'gha', mode: 'max' } },
    ...overrides,
  };
}

export interface ImagePublisherFakes {
  registry: FakeRegistry;
  builder: FakeImageBuilder;
  credentials: CredentialProvider;
  context: ContextSource;
  publisher: ImagePublisher;
}

/** A real ImagePublisher wired to in-memory collaborators on an amd64 host. */
export function createImagePublisherFakes(options: { auth?: AuthResult; missing?: string[] } = {}): ImagePublisherFakes {
  const registry = new FakeRegistry();
  const builder = new FakeImageBuilder(registry);
  const credentials: CredentialProvider = {
    authenticate: jest.fn(async () => options.auth ?? { ok: true as const, credential: { username: 'ci', secret: SECRET } }),
  };
  const context: ContextSource = {
    exists: jest.fn(async (path: string) => !(options.missing ?? []).includes(path)),
  };
  const publisher = new ImagePublisher({ credentials, context, builder, registry }, { hostPlatform: 'linux/amd64' });
  return { registry, builder, credentials, context, publisher };
}
