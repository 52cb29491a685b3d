import { mkdtemp, rm, stat, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { EnvCredentialProvider } from '../../src/adapters/env-credentials';
import { FsContextSource } from '../../src/adapters/fs-context';
import { TempDirEnvironmentProvider } from '../../src/adapters/local-environment';
import { formatCommand } from '../../src/adapters/command-runner';
import { makeJob } from '../helpers/fixtures';
import { SECRET } from '../helpers/fakes';

describe('local adapters', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'forge-adapters-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('TempDirEnvironmentProvider', () => {
    it('gives each job its own directory and removes it on release', async () => {
      const provider = new TempDirEnvironmentProvider({ workRoot: path.join(root, 'work') });
      const job = makeJob(0);

      const first = await provider.acquire(job);
      const second = await provider.acquire(job);

      expect(first.workDir).not.toBe(second.workDir);
      expect(path.basename(first.workDir).startsWith(`${job.id}-`)).toBe(true);
      expect(first.id).toBe(path.basename(first.workDir));
      expect(first.target).toBe(job.target);

      await provider.release(first);
      await expect(stat(first.workDir)).rejects.toMatchObject({ code: 'ENOENT' });
      expect((await stat(second.workDir)).isDirectory()).toBe(true);
    });

    it('keeps directories when asked to', async () => {
      const provider = new TempDirEnvironmentProvider({ workRoot: root, keep: true });
      const env = await provider.acquire(makeJob(1));

      await provider.release(env);

      expect((await stat(env.workDir)).isDirectory()).toBe(true);
    });
  });

  describe('FsContextSource', () => {
    it('resolves paths against its base directory', async () => {
      await writeFile(path.join(root, 'Dockerfile'), 'FROM alpine\n');
      const source = new FsContextSource(root);

      expect(await source.exists('Dockerfile')).toBe(true);
      expect(await source.exists('.')).toBe(true);
      expect(await source.exists('missing.Dockerfile')).toBe(false);
    });
  });
});

describe('EnvCredentialProvider', () => {
  it('returns the configured credential', async () => {
    const provider = new EnvCredentialProvider('ci', SECRET);
    expect(await provider.authenticate('registry.test')).toEqual({
      ok: true,
      credential: { username: 'ci', secret: SECRET },
    });
  });

  it('fails without a token', async () => {
    const provider = new EnvCredentialProvider('ci', undefined);
    expect(await provider.authenticate('registry.test')).toEqual({
      ok: false,
      message: 'no credentials configured for registry.test',
    });
  });
});

describe('formatCommand', () => {
  it('quotes arguments containing whitespace', () => {
    expect(formatCommand('cargo', ['build', '--features', 'a,b'])).toBe('cargo build --features a,b');
    expect(formatCommand('sh', ['-c', 'echo hi'])).toBe('sh -c "echo hi"');
  });
});
