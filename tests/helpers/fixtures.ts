import { BuildJob } from '../../src/domain/job';
import { FeatureCatalog } from '../../src/domain/feature';
import { MatrixPipeline } from '../../src/domain/pipeline';
import { Target, freezeTarget } from '../../src/domain/target';
import { computeJobId } from '../../src/matrix/expander';

export const CATALOG: FeatureCatalog = {
  categories: [
    { name: 'cryptoBackend', kind: 'exclusive', mandatory: true },
    { name: 'rustlsProvider', kind: 'exclusive', mandatory: false },
    { name: 'resolver', kind: 'additive', mandatory: false },
    { name: 'transport', kind: 'additive', mandatory: false },
  ],
  toggles: [
    { name: 'vendored-openssl', category: 'cryptoBackend' },
    { name: 'vendored-tongsuo', category: 'cryptoBackend' },
    { name: 'vendored-boringssl', category: 'cryptoBackend', platforms: ['windows-x64'], installs: ['nasm', 'ninja'] },
    { name: 'rustls-ring', category: 'rustlsProvider' },
    { name: 'vendored-c-ares', category: 'resolver' },
    { name: 'hickory', category: 'resolver' },
    { name: 'quic', category: 'transport', requires: ['rustls-ring'] },
  ],
};

export const LINUX: Target = freezeTarget({
  id: 'linux-x64',
  os: 'linux',
  arch: 'x86_64',
  toolchain: 'x86_64-unknown-linux-musl',
  platform: 'linux-x64',
  crossTarget: true,
  packages: ['capnproto', 'musl-tools'],
});

export const WINDOWS: Target = freezeTarget({
  id: 'windows-x64',
  os: 'windows',
  arch: 'x86_64',
  toolchain: 'x86_64-pc-windows-msvc',
  platform: 'windows-x64',
  packages: ['capnproto'],
  components: ['clippy'],
  env: { CARGO_TARGET_X86_64_PC_WINDOWS_MSVC_RUSTFLAGS: '-C target-feature=+crt-static' },
});

export function makeMatrixPipeline(overrides: Partial<MatrixPipeline> = {}): MatrixPipeline {
  return {
    id: 'static',
    name: 'Static builds',
    kind: 'matrix',
    catalog: CATALOG,
    targets: [LINUX, WINDOWS],
    combinations: [['vendored-openssl'], ['vendored-tongsuo']],
    baseFeatures: [],
    noDefaultFeatures: false,
    policy: 'fail-fast',
    concurrency: 1,
    ...overrides,
  };
}

/** A job for a target and combination, as the expander would build it. */
export function makeJob(index: number, target: Target = LINUX, combination: string[] = ['vendored-openssl']): BuildJob {
  const combinationKey = combination.join(',');
  return {
    id: computeJobId(target.id, combinationKey),
    index,
    target,
    combination,
    combinationKey,
    noDefaultFeatures: false,
    extraPackages: [],
  };
}

/** Resolve after pending promise callbacks have run. */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
