/**
 * Build target domain model.
 *
 * A target is one platform a build runs for: the OS/architecture/toolchain
 * triple plus the host-level setup every build on it needs. Targets are
 * defined in configuration and frozen once loaded.
 */

export type TargetOs = 'linux' | 'windows' | 'macos';

export interface Target {
  /** Stable identifier, also the primary sort key of the matrix (e.g. "linux-x64"). */
  id: string;
  os: TargetOs;
  arch: string;
  /** Toolchain triple (e.g. "x86_64-unknown-linux-musl"). */
  toolchain: string;
  /** Platform id toggle applicability is matched against. */
  platform: string;
  /** Runner image or host label builds are scheduled on. */
  host?: string;
  /** When set, the build passes the toolchain triple explicitly (cross target). */
  crossTarget?: boolean;
  /** Toolchain packages every build on this target needs. */
  packages?: readonly string[];
  /** Toolchain components to install alongside the compiler. */
  components?: readonly string[];
  /** Extra environment for the build process. */
  env?: Readonly<Record<string, string>>;
}

/** Freeze a target (and its nested collections) so configuration can't drift at run time. */
export function freezeTarget(target: Target): Readonly<Target> {
  return Object.freeze({
    ...target,
    packages: target.packages ? Object.freeze([...target.packages]) : undefined,
    components: target.components ? Object.freeze([...target.components]) : undefined,
    env: target.env ? Object.freeze({ ...target.env }) : undefined,
  });
}

/** Order targets by id, the matrix's primary sort key. */
export function compareTargets(a: Target, b: Target): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
