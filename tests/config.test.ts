import path from 'path';
import { detectHostPlatform, loadConfig } from '../src/config';
import { LogLevel } from '../src/logger';

describe('loadConfig', () => {
  test('uses defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(5000);
    expect(config.logLevel).toBe(LogLevel.Info);
    expect(config.pipelinesFile).toBe(path.resolve(process.cwd(), 'config', 'pipelines.json'));
    expect(config.concurrency).toBeUndefined();
    expect(config.policy).toBeUndefined();
    expect(config.buildTimeoutMs).toBeUndefined();
    expect(config.diagnosticsLimit).toBe(65536);
    expect(config.useSudo).toBe(false);
  });

  test('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      FORGE_LOG_LEVEL: 'DEBUG',
      FORGE_CONCURRENCY: '4',
      FORGE_POLICY: 'fail-continue',
      FORGE_BUILD_TIMEOUT_MS: '600000',
      FORGE_HOST_PLATFORM: 'linux/arm64',
      FORGE_REGISTRY_USERNAME: 'ci',
      FORGE_REGISTRY_TOKEN: 'test-secret',
      FORGE_USE_SUDO: '1',
    });

    expect(config).toMatchObject({
      port: 8080,
      logLevel: LogLevel.Debug,
      concurrency: 4,
      policy: 'fail-continue',
      buildTimeoutMs: 600000,
      hostPlatform: 'linux/arm64',
      registryUsername: 'ci',
      registryToken: 'test-secret',
      useSudo: true,
    });
  });

  test('rejects invalid values', () => {
    expect(() => loadConfig({ FORGE_CONCURRENCY: '0' })).toThrow('FORGE_CONCURRENCY must be an integer >= 1, got "0"');
    expect(() => loadConfig({ FORGE_POLICY: 'sometimes' })).toThrow(
      'FORGE_POLICY must be one of fail-fast, fail-continue, got "sometimes"',
    );
    expect(() => loadConfig({ FORGE_LOG_LEVEL: 'loud' })).toThrow(/^FORGE_LOG_LEVEL must be one of/);
  });
});

describe('detectHostPlatform', () => {
  test('maps node platform and arch names to OCI names', () => {
    expect(detectHostPlatform('linux', 'x64')).toBe('linux/amd64');
    expect(detectHostPlatform('win32', 'arm64')).toBe('windows/arm64');
    expect(detectHostPlatform('darwin', 'mips')).toBe('darwin/mips');
  });
});
