/**
 * Runtime configuration.
 *
 * Defaults for every setting, overridable through environment variables.
 * Pipeline definitions themselves live in a JSON file (FORGE_PIPELINES_FILE).
 */

import path from 'path';
import { FAILURE_POLICIES, FailurePolicy } from './domain/pipeline';
import { LogLevel } from './logger';

export interface OrchestratorConfig {
  port: number;
  logLevel: LogLevel;
  /** Pipeline definitions document. */
  pipelinesFile: string;
  /** Source checkout builds run against. */
  sourceDir: string;
  /** Parent directory for per-job build environments. */
  workDir: string;
  /** Default concurrency when neither the pipeline nor the trigger sets one. */
  concurrency?: number;
  /** Overrides the pipeline's failure policy. */
  policy?: FailurePolicy;
  buildTimeoutMs?: number;
  diagnosticsLimit: number;
  /** Platform of this machine in OCI notation. */
  hostPlatform: string;
  registryUsername?: string;
  registryToken?: string;
  /** Let the installer use sudo for system packages. */
  useSudo: boolean;
}

const ARCH_TO_OCI: Record<string, string> = {
  x64: 'amd64',
  arm64: 'arm64',
  arm: 'arm',
  ia32: '386',
  ppc64: 'ppc64le',
  s390x: 's390x',
  riscv64: 'riscv64',
};

/** The OCI platform of the current process ("linux/amd64"). */
export function detectHostPlatform(platform: string = process.platform, arch: string = process.arch): string {
  const os = platform === 'win32' ? 'windows' : platform;
  return `${os}/${ARCH_TO_OCI[arch] ?? arch}`;
}

function parseInteger(name: string, value: string | undefined, min: number): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${value}"`);
  }
  return parsed;
}

function parseLogLevel(value: string | undefined): LogLevel {
  const levels: string[] = Object.values(LogLevel);
  if (!value) return LogLevel.Info;
  const match = Object.values(LogLevel).find((level) => level === value.toLowerCase());
  if (!match) throw new Error(`FORGE_LOG_LEVEL must be one of ${levels.join(', ')}, got "${value}"`);
  return match;
}

function parsePolicy(value: string | undefined): FailurePolicy | undefined {
  if (!value) return undefined;
  const match = FAILURE_POLICIES.find((p) => p === value);
  if (!match) throw new Error(`FORGE_POLICY must be one of ${FAILURE_POLICIES.join(', ')}, got "${value}"`);
  return match;
}

/** Read configuration from an environment (defaults to process.env). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): OrchestratorConfig {
  const cwd = process.cwd();
  return {
    port: parseInteger('PORT', env.PORT, 0) ?? 5000,
    logLevel: parseLogLevel(env.FORGE_LOG_LEVEL),
    pipelinesFile: path.resolve(cwd, env.FORGE_PIPELINES_FILE ?? path.join('config', 'pipelines.json')),
    sourceDir: path.resolve(cwd, env.FORGE_SOURCE_DIR ?? '.'),
    workDir: path.resolve(cwd, env.FORGE_WORK_DIR ?? path.join('.forge', 'work')),
    concurrency: parseInteger('FORGE_CONCURRENCY', env.FORGE_CONCURRENCY, 1),
    policy: parsePolicy(env.FORGE_POLICY),
    buildTimeoutMs: parseInteger('FORGE_BUILD_TIMEOUT_MS', env.FORGE_BUILD_TIMEOUT_MS, 1),
    diagnosticsLimit: parseInteger('FORGE_DIAGNOSTICS_LIMIT', env.FORGE_DIAGNOSTICS_LIMIT, 1) ?? 64 * 1024,
    hostPlatform: env.FORGE_HOST_PLATFORM ?? detectHostPlatform(),
    registryUsername: env.FORGE_REGISTRY_USERNAME,
    registryToken: env.FORGE_REGISTRY_TOKEN,
    useSudo: env.FORGE_USE_SUDO === '1',
  };
}
