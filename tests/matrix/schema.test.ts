import { readFileSync } from 'fs';
import path from 'path';
import { parsePipelineDefinitions } from '../../src/matrix/schema';
import { expandMatrix } from '../../src/matrix/expander';
import { isMatrixPipeline } from '../../src/domain/pipeline';

const PIPELINES_FILE = path.join(__dirname, '..', '..', 'config', 'pipelines.json');

function minimalMatrix(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'm',
    kind: 'matrix',
    catalog: {
      categories: [{ name: 'backend', kind: 'exclusive', mandatory: true }],
      toggles: [
        { name: 'a', category: 'backend' },
        { name: 'b', category: 'backend' },
      ],
    },
    targets: [{ id: 'linux-x64', os: 'linux', arch: 'x86_64', toolchain: 'x86_64-unknown-linux-gnu' }],
    combinations: ['a', ['b']],
    ...overrides,
  };
}

describe('parsePipelineDefinitions', () => {
  test('the bundled pipelines file is valid', () => {
    const result = parsePipelineDefinitions(JSON.parse(readFileSync(PIPELINES_FILE, 'utf8')));
    expect(result.errors).toEqual([]);
    expect(result.pipelines.map((p) => [p.id, p.kind])).toEqual([
      ['static', 'matrix'],
      ['docker', 'image'],
    ]);
  });

  test('the bundled static matrix expands to five jobs and drops boringssl on musl', () => {
    const result = parsePipelineDefinitions(JSON.parse(readFileSync(PIPELINES_FILE, 'utf8')));
    const pipeline = result.pipelines.find((p) => p.id === 'static');
    if (!pipeline || !isMatrixPipeline(pipeline)) throw new Error('static matrix missing');

    const { jobs, rejections } = expandMatrix(pipeline);
    expect(jobs.map((j) => `${j.target.id} ${j.combination[0]}`)).toEqual([
      'linux-x64-musl vendored-openssl',
      'linux-x64-musl vendored-tongsuo',
      'windows-x64-msvc vendored-boringssl',
      'windows-x64-msvc vendored-openssl',
      'windows-x64-msvc vendored-tongsuo',
    ]);
    expect(jobs[0].combinationKey).toBe('vendored-openssl,rustls-ring,vendored-c-ares,hickory,quic');
    expect(rejections.map((r) => r.reason)).toEqual([
      'toggle vendored-boringssl unsupported on platform linux-x64-musl',
    ]);
  });

  test('applies defaults', () => {
    const result = parsePipelineDefinitions({ pipelines: [minimalMatrix()] });
    expect(result.valid).toBe(true);
    const [pipeline] = result.pipelines;
    if (!isMatrixPipeline(pipeline)) throw new Error('expected a matrix');
    expect(pipeline.name).toBe('m');
    expect(pipeline.policy).toBe('fail-fast');
    expect(pipeline.concurrency).toBe(1);
    expect(pipeline.noDefaultFeatures).toBe(false);
    expect(pipeline.baseFeatures).toEqual([]);
    expect(pipeline.targets[0].platform).toBe('linux-x64');
    expect(pipeline.combinations).toEqual([['a'], ['b']]);
  });

  test('rejects a document without a pipelines array', () => {
    const result = parsePipelineDefinitions({ pipeline: [] });
    expect(result.valid).toBe(false);
    expect(result.errors[0].message).toBe('$: document must be an object with a "pipelines" array');
  });

  test('reports errors with their JSON path', () => {
    const result = parsePipelineDefinitions({
      pipelines: [minimalMatrix({ policy: 'sometimes', concurrency: 0 })],
    });
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.message)).toEqual([
      '$.pipelines[0].policy: must be one of fail-fast, fail-continue',
      '$.pipelines[0].concurrency: must be an integer between 1 and 64',
    ]);
  });

  test('rejects duplicate pipeline ids', () => {
    const result = parsePipelineDefinitions({ pipelines: [minimalMatrix(), minimalMatrix()] });
    expect(result.errors.map((e) => e.message)).toEqual(['$.pipelines[1].id: duplicate pipeline id "m"']);
    expect(result.pipelines).toHaveLength(1);
  });

  test('rejects an unknown kind', () => {
    const result = parsePipelineDefinitions({ pipelines: [{ id: 'x', kind: 'deploy' }] });
    expect(result.errors.map((e) => e.message)).toEqual(['$.pipelines[0].kind: must be "matrix" or "image"']);
  });

  test('surfaces catalog errors', () => {
    const result = parsePipelineDefinitions({
      pipelines: [
        minimalMatrix({
          catalog: {
            categories: [{ name: 'backend', kind: 'exclusive' }],
            toggles: [{ name: 'a', category: 'frontend' }],
          },
        }),
      ],
    });
    expect(result.errors.map((e) => e.code)).toEqual(['VALIDATION.UNKNOWN_CATEGORY']);
  });

  test('parses an image pipeline', () => {
    const result = parsePipelineDefinitions({
      pipelines: [
        {
          id: 'img',
          kind: 'image',
          request: {
            context: '.',
            recipe: 'Dockerfile',
            platforms: ['linux/amd64', 'linux/arm64'],
            destination: { registry: 'registry.test', repository: 'team/app', tag: 'latest' },
            cache: { from: [{ type: 'gha' }], to: { type: 'gha', mode: 'max' } },
          },
        },
      ],
    });
    expect(result.errors).toEqual([]);
    const [pipeline] = result.pipelines;
    if (pipeline.kind !== 'image') throw new Error('expected an image pipeline');
    expect(pipeline.platformConcurrency).toBe(2);
    expect(pipeline.request.cache).toEqual({ from: [{ type: 'gha' }], to: { type: 'gha', mode: 'max' } });
  });

  test('rejects invalid platforms and uppercase repositories', () => {
    const result = parsePipelineDefinitions({
      pipelines: [
        {
          id: 'img',
          kind: 'image',
          request: {
            context: '.',
            recipe: 'Dockerfile',
            platforms: ['amd64'],
            destination: { registry: 'registry.test', repository: 'Team/App', tag: 'latest' },
          },
        },
      ],
    });
    expect(result.errors.map((e) => e.message)).toEqual([
      '$.pipelines[0].request.platforms[0]: invalid platform "amd64"',
      '$.pipelines[0].request.destination.repository: must be lowercase',
    ]);
  });
});
