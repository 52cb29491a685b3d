/**
 * Container image publishing domain model.
 *
 * A publish request describes one logical image built for several CPU
 * architectures and published under one tag as an OCI image index.
 */

import { TypedError } from './errors';

/** Image publisher lifecycle states. */
export enum PublishState {
  Idle = 'idle',
  ContextPrepared = 'context-prepared',
  MultiArchBuildInProgress = 'multi-arch-build-in-progress',
  Published = 'published',
  Failed = 'failed',
}

/** Valid state transitions for a publish. */
export const VALID_PUBLISH_TRANSITIONS: Record<PublishState, PublishState[]> = {
  [PublishState.Idle]: [PublishState.ContextPrepared, PublishState.Failed],
  [PublishState.ContextPrepared]: [PublishState.MultiArchBuildInProgress, PublishState.Failed],
  [PublishState.MultiArchBuildInProgress]: [PublishState.Published, PublishState.Failed],
  [PublishState.Published]: [],
  [PublishState.Failed]: [],
};

/** Where an image ends up. */
export interface ImageDestination {
  /** Registry host (e.g. "ghcr.io"). */
  registry: string;
  /** Repository path inside the registry (e.g. "acme/proxy"). */
  repository: string;
  tag: string;
}

/** A layer cache location the builder reads from or writes to. */
export interface CacheReference {
  /** Cache backend as the builder names it ("gha", "registry", "local"). */
  type: string;
  /** Backend-specific reference (e.g. an image ref for "registry"). */
  ref?: string;
  /** "max" exports every intermediate layer, "min" only the final ones. */
  mode?: 'min' | 'max';
}

export interface PublishRequest {
  /** Build context directory. */
  context: string;
  /** Build recipe (Dockerfile) path, relative to the working directory. */
  recipe: string;
  /** Target platforms in OCI notation ("linux/amd64", "linux/arm64/v8"). */
  platforms: string[];
  destination: ImageDestination;
  cache: {
    from: CacheReference[];
    to?: CacheReference;
  };
  /** Build arguments passed to the recipe. */
  buildArgs?: Record<string, string>;
}

/** OCI platform object. */
export interface OciPlatform {
  os: string;
  architecture: string;
  variant?: string;
}

/** OCI content descriptor. */
export interface OciDescriptor {
  mediaType: string;
  digest: string;
  size: number;
  platform?: OciPlatform;
}

/** OCI image index: the multi-architecture manifest published under the tag. */
export interface OciImageIndex {
  schemaVersion: 2;
  mediaType: string;
  manifests: OciDescriptor[];
}

export const OCI_INDEX_MEDIA_TYPE = 'application/vnd.oci.image.index.v1+json';
export const OCI_MANIFEST_MEDIA_TYPE = 'application/vnd.oci.image.manifest.v1+json';

/** Outcome of one architecture's build. */
export interface PlatformBuildOutcome {
  platform: string;
  emulated: boolean;
  succeeded: boolean;
  /** Per-platform manifest descriptor, pushed by digest (untagged). */
  manifest?: OciDescriptor;
  /** Whether the builder reported reusing cached layers. */
  cacheHit?: boolean;
  diagnostics?: string;
  /** Why the build failed. */
  error?: string;
  durationMs?: number;
}

export interface PublishResult {
  status: PublishState.Published | PublishState.Failed;
  /** Fully qualified reference (`registry/repository:tag@digest`) when published. */
  reference?: string;
  /** Digest of the published image index. */
  digest?: string;
  /** Digest the tag pointed at before this publish, if any. */
  previousDigest?: string;
  platforms: PlatformBuildOutcome[];
  /** States visited, in order, starting at Idle. */
  states: PublishState[];
  error?: TypedError;
}

/** Parse "os/arch[/variant]" into an OCI platform object. */
export function parsePlatform(value: string): OciPlatform | undefined {
  const parts = value.split('/');
  if (parts.length < 2 || parts.length > 3 || parts.some((p) => p.length === 0)) return undefined;
  const [os, architecture, variant] = parts;
  return variant ? { os, architecture, variant } : { os, architecture };
}

/** Format an OCI platform back to "os/arch[/variant]". */
export function formatPlatform(platform: OciPlatform): string {
  return platform.variant
    ? `${platform.os}/${platform.architecture}/${platform.variant}`
    : `${platform.os}/${platform.architecture}`;
}

/** "registry/repository:tag" */
export function formatImageReference(destination: ImageDestination, digest?: string): string {
  const base = `${destination.registry}/${destination.repository}:${destination.tag}`;
  return digest ? `${base}@${digest}` : base;
}
