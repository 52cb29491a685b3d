/**
 * Image Publisher — multi-architecture container build and publish.
 *
 * State machine: Idle → ContextPrepared → MultiArchBuildInProgress →
 * Published | Failed.
 *
 * Each architecture is built (natively or under emulation) and pushed by
 * digest only. The image index is assembled from those digests, pushed by
 * its own digest, and only then written under the destination tag in a
 * single manifest PUT. A failure anywhere before that PUT leaves the tag
 * where it was; layers already pushed stay in the cache for the next run.
 *
 * The index is serialised with a fixed key and platform order, so the same
 * per-architecture digests always give the same index digest, whether the
 * builds hit the layer cache or not.
 */

import { createHash } from 'crypto';
import {
  TypedError,
  createTypedError,
  describeError,
  manifestAssemblyError,
  maskSecretsInMessage,
  platformBuildError,
  publishAuthError,
  publishContextError,
} from '../domain/errors';
import {
  CacheReference,
  ImageDestination,
  OCI_INDEX_MEDIA_TYPE,
  OciDescriptor,
  OciImageIndex,
  PlatformBuildOutcome,
  PublishRequest,
  PublishResult,
  PublishState,
  formatImageReference,
  formatPlatform,
  parsePlatform,
} from '../domain/image';
import { Logger, logger as rootLogger } from '../logger';
import { CancellationToken, NEVER_CANCELED } from './cancellation';
import { transitionPublishState } from './state-machine';

/** Short-lived registry credential. Opaque to the publisher. */
export interface RegistryCredential {
  username: string;
  secret: string;
}

export type AuthResult = { ok: true; credential: RegistryCredential } | { ok: false; message: string };

export interface CredentialProvider {
  authenticate(registry: string): Promise<AuthResult>;
}

/** Resolves build context paths. */
export interface ContextSource {
  exists(path: string): Promise<boolean>;
}

export interface PlatformBuildRequest {
  context: string;
  recipe: string;
  platform: string;
  emulated: boolean;
  destination: ImageDestination;
  cacheFrom: CacheReference[];
  cacheTo?: CacheReference;
  buildArgs: Record<string, string>;
  credential: RegistryCredential;
}

export type PlatformBuildOutput =
  | { ok: true; manifest: OciDescriptor; cacheHit: boolean; output: string }
  | { ok: false; message: string; output: string };

/** Builds one architecture and pushes it by digest (never by tag). */
export interface ImageBuilder {
  buildPlatform(request: PlatformBuildRequest): Promise<PlatformBuildOutput>;
}

/** Registry failure carrying the HTTP status. */
export class RegistryError extends Error {
  constructor(message: string, public status: number) {
    super(message);
    this.name = 'RegistryError';
  }
}

/** The subset of the OCI distribution API the publisher uses. */
export interface RegistryClient {
  hasManifest(destination: ImageDestination, digest: string, credential: RegistryCredential): Promise<boolean>;
  putManifest(
    destination: ImageDestination,
    reference: string,
    body: Buffer,
    mediaType: string,
    credential: RegistryCredential,
  ): Promise<string>;
  resolveTag(destination: ImageDestination, credential: RegistryCredential): Promise<string | undefined>;
}

export interface ImagePublisherDeps {
  credentials: CredentialProvider;
  context: ContextSource;
  builder: ImageBuilder;
  registry: RegistryClient;
}

export interface ImagePublisherConfig {
  /** Platform of the machine running the builds ("linux/amd64"). */
  hostPlatform: string;
  /** Architecture builds running at once. */
  platformConcurrency: number;
}

export interface PublishOptions {
  token?: CancellationToken;
  /** Overrides the configured platform concurrency for this publish. */
  platformConcurrency?: number;
  onStateChange?: (state: PublishState) => void;
  onPlatformCompleted?: (outcome: PlatformBuildOutcome) => void;
}

/** Compute the OCI digest of some bytes. */
export function computeDigest(bytes: Buffer): string {
  return `sha256:${createHash('sha256').update(bytes).digest('hex')}`;
}

/**
 * Build the image index for per-platform manifests, listed in the given
 * platform order, and serialise it with a fixed key order.
 */
export function assembleImageIndex(manifests: Array<{ platform: string; manifest: OciDescriptor }>): {
  index: OciImageIndex;
  body: Buffer;
  digest: string;
} {
  const descriptors: OciDescriptor[] = manifests.map(({ platform, manifest }) => {
    const parsed = parsePlatform(platform);
    if (!parsed) throw new Error(`invalid platform "${platform}"`);
    return {
      mediaType: manifest.mediaType,
      digest: manifest.digest,
      size: manifest.size,
      platform: parsed.variant
        ? { architecture: parsed.architecture, os: parsed.os, variant: parsed.variant }
        : { architecture: parsed.architecture, os: parsed.os },
    };
  });
  const index: OciImageIndex = {
    schemaVersion: 2,
    mediaType: OCI_INDEX_MEDIA_TYPE,
    manifests: descriptors,
  };
  const body = Buffer.from(JSON.stringify(index), 'utf8');
  return { index, body, digest: computeDigest(body) };
}

/** Whether a platform needs emulation on the given host. */
export function needsEmulation(platform: string, hostPlatform: string): boolean {
  const target = parsePlatform(platform);
  const host = parsePlatform(hostPlatform);
  if (!target || !host) return true;
  return target.os !== host.os || target.architecture !== host.architecture;
}

async function mapBounded<T, R>(items: T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const i = next++;
      results[i] = await fn(items[i]);
    }
  };
  await Promise.all(Array.from({ length: Math.min(Math.max(limit, 1), items.length) }, () => worker()));
  return results;
}

/** Thrown internally to end a publish in Failed with a typed error. */
class PublishAbort extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'PublishAbort';
  }
}

export class ImagePublisher {
  private config: ImagePublisherConfig;
  private log: Logger;

  constructor(private deps: ImagePublisherDeps, config?: Partial<ImagePublisherConfig>, log: Logger = rootLogger) {
    this.config = { hostPlatform: 'linux/amd64', platformConcurrency: 2, ...config };
    this.log = log.child({ module: 'image-publisher' });
  }

  async publish(request: PublishRequest, options: PublishOptions = {}): Promise<PublishResult> {
    const token = options.token ?? NEVER_CANCELED;
    const reference = formatImageReference(request.destination);
    const publishLog = this.log.child({ image: reference });
    const states: PublishState[] = [PublishState.Idle];
    const outcomes: PlatformBuildOutcome[] = [];
    const secrets: string[] = [];

    const move = (target: PublishState): void => {
      const current = states[states.length - 1];
      const result = transitionPublishState(current, target);
      if (!result.success) throw new PublishAbort(result.error);
      states.push(result.newStatus);
      publishLog.debug('Publish state changed', { from: current, to: target });
      options.onStateChange?.(target);
    };

    const checkCanceled = (): void => {
      if (token.canceled) {
        throw new PublishAbort(
          createTypedError({ code: 'PUBLISH.CANCELED', message: `Publish canceled: ${token.reason ?? 'canceled'}` }),
        );
      }
    };

    try {
      // Idle -> ContextPrepared
      const platforms = await this.prepareContext(request);
      move(PublishState.ContextPrepared);
      checkCanceled();

      const auth = await this.deps.credentials
        .authenticate(request.destination.registry)
        .catch((err: unknown): AuthResult => ({ ok: false, message: describeError(err) }));
      if (!auth.ok) throw new PublishAbort(publishAuthError(request.destination.registry, auth.message));
      const credential = auth.credential;
      secrets.push(credential.secret);
      checkCanceled();

      // ContextPrepared -> MultiArchBuildInProgress
      move(PublishState.MultiArchBuildInProgress);
      const concurrency = options.platformConcurrency ?? this.config.platformConcurrency;
      const built = await mapBounded(platforms, concurrency, async (platform) => {
        const outcome = await this.buildPlatform(request, platform, credential, token);
        options.onPlatformCompleted?.(outcome);
        return outcome;
      });
      outcomes.push(...built);
      // Platforms skipped by a cancel are not build failures.
      checkCanceled();

      const firstFailure = built.find((o) => !o.succeeded);
      if (firstFailure) {
        throw new PublishAbort(
          platformBuildError(
            firstFailure.platform,
            maskSecretsInMessage(firstFailure.error ?? 'build failed', secrets),
            firstFailure.diagnostics,
          ),
        );
      }

      const { digest, previousDigest } = await this.pushIndex(request.destination, built, credential);

      // MultiArchBuildInProgress -> Published
      move(PublishState.Published);
      const published = formatImageReference(request.destination, digest);
      publishLog.info('Image published', { digest, previousDigest, unchanged: digest === previousDigest, platforms });
      return {
        status: PublishState.Published,
        reference: published,
        digest,
        previousDigest,
        platforms: outcomes,
        states,
      };
    } catch (err) {
      const error =
        err instanceof PublishAbort
          ? err.typedError
          : createTypedError({
              code: 'SYSTEM.INTERNAL',
              message: maskSecretsInMessage(describeError(err), secrets),
            });
      if (states[states.length - 1] !== PublishState.Failed) {
        states.push(PublishState.Failed);
        options.onStateChange?.(PublishState.Failed);
      }
      publishLog.error('Publish failed; tag left unchanged', { code: error.code, message: error.message });
      return {
        status: PublishState.Failed,
        platforms: outcomes,
        states,
        error,
      };
    }
  }

  private async prepareContext(request: PublishRequest): Promise<string[]> {
    if (request.platforms.length === 0) {
      throw new PublishAbort(publishContextError('At least one platform is required'));
    }
    const seen = new Set<string>();
    for (const platform of request.platforms) {
      const parsed = parsePlatform(platform);
      if (!parsed) throw new PublishAbort(publishContextError(`Invalid platform "${platform}"`, { platform }));
      const normalized = formatPlatform(parsed);
      if (seen.has(normalized)) {
        throw new PublishAbort(publishContextError(`Duplicate platform "${platform}"`, { platform }));
      }
      seen.add(normalized);
    }

    if (!(await this.deps.context.exists(request.context))) {
      throw new PublishAbort(publishContextError(`Build context not found: ${request.context}`, { context: request.context }));
    }
    if (!(await this.deps.context.exists(request.recipe))) {
      throw new PublishAbort(publishContextError(`Build recipe not found: ${request.recipe}`, { recipe: request.recipe }));
    }
    return [...seen];
  }

  private async buildPlatform(
    request: PublishRequest,
    platform: string,
    credential: RegistryCredential,
    token: CancellationToken,
  ): Promise<PlatformBuildOutcome> {
    const emulated = needsEmulation(platform, this.config.hostPlatform);
    if (token.canceled) {
      return { platform, emulated, succeeded: false, error: `canceled: ${token.reason ?? 'canceled'}` };
    }

    const started = Date.now();
    this.log.info('Platform build started', { platform, emulated });
    try {
      const output = await this.deps.builder.buildPlatform({
        context: request.context,
        recipe: request.recipe,
        platform,
        emulated,
        destination: request.destination,
        cacheFrom: request.cache.from,
        cacheTo: request.cache.to,
        buildArgs: request.buildArgs ?? {},
        credential,
      });
      const durationMs = Date.now() - started;
      if (!output.ok) {
        return { platform, emulated, succeeded: false, diagnostics: output.output, durationMs, error: output.message };
      }
      return {
        platform,
        emulated,
        succeeded: true,
        manifest: output.manifest,
        cacheHit: output.cacheHit,
        diagnostics: output.output,
        durationMs,
      };
    } catch (err) {
      return { platform, emulated, succeeded: false, durationMs: Date.now() - started, error: describeError(err) };
    }
  }

  private async pushIndex(
    destination: ImageDestination,
    outcomes: PlatformBuildOutcome[],
    credential: RegistryCredential,
  ): Promise<{ digest: string; previousDigest?: string }> {
    const manifests: Array<{ platform: string; manifest: OciDescriptor }> = [];
    for (const outcome of outcomes) {
      if (!outcome.manifest) {
        throw new PublishAbort(manifestAssemblyError(`No manifest reported for ${outcome.platform}`));
      }
      manifests.push({ platform: outcome.platform, manifest: outcome.manifest });
    }

    try {
      for (const { platform, manifest } of manifests) {
        if (!(await this.deps.registry.hasManifest(destination, manifest.digest, credential))) {
          throw new PublishAbort(
            manifestAssemblyError(`Manifest for ${platform} is missing from the registry`, { platform, digest: manifest.digest }),
          );
        }
      }

      const { body, digest } = assembleImageIndex(manifests);
      const previousDigest = await this.deps.registry.resolveTag(destination, credential);
      await this.deps.registry.putManifest(destination, digest, body, OCI_INDEX_MEDIA_TYPE, credential);
      // The tag moves in this single request, after everything it points to exists.
      await this.deps.registry.putManifest(destination, destination.tag, body, OCI_INDEX_MEDIA_TYPE, credential);
      return { digest, previousDigest };
    } catch (err) {
      if (err instanceof PublishAbort) throw err;
      const message = maskSecretsInMessage(describeError(err), [credential.secret]);
      if (err instanceof RegistryError && (err.status === 401 || err.status === 403)) {
        throw new PublishAbort(publishAuthError(destination.registry, message));
      }
      throw new PublishAbort(manifestAssemblyError(`Could not push image index: ${message}`));
    }
  }
}
