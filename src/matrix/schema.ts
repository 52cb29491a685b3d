/**
 * Pipeline definition schema.
 *
 * Pipelines are configuration data (config/pipelines.json). This module
 * turns an untrusted JSON document into typed definitions, collecting every
 * problem as a typed error rather than stopping at the first one.
 */

import { TypedError, createTypedError } from '../domain/errors';
import { CategoryKind, FeatureCatalog, FeatureCategory, FeatureToggle, parseFeatureList } from '../domain/feature';
import { CacheReference, PublishRequest, parsePlatform } from '../domain/image';
import { FAILURE_POLICIES, FailurePolicy, ImagePipeline, MatrixPipeline, PipelineDefinition } from '../domain/pipeline';
import { Target, TargetOs, freezeTarget } from '../domain/target';
import { validateCatalog } from './validator';

export const SCHEMA_CONSTRAINTS = {
  maxTargets: 32,
  maxCombinations: 256,
  maxConcurrency: 64,
  maxPlatforms: 16,
} as const;

const TARGET_OSES: readonly TargetOs[] = ['linux', 'windows', 'macos'];
const CATEGORY_KINDS: readonly CategoryKind[] = ['exclusive', 'additive'];

export interface PipelineParseResult {
  valid: boolean;
  pipelines: PipelineDefinition[];
  errors: TypedError[];
}

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === 'string');
}

function includes<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && values.some((v) => v === value);
}

/** Collects errors under a JSON path prefix. */
export class SchemaReader {
  constructor(private errors: TypedError[], private path: string) {}

  at(segment: string | number): SchemaReader {
    return new SchemaReader(this.errors, typeof segment === 'number' ? `${this.path}[${segment}]` : `${this.path}.${segment}`);
  }

  fail(message: string): undefined {
    this.errors.push(
      createTypedError({
        code: 'VALIDATION.SCHEMA',
        message: `${this.path}: ${message}`,
        details: { path: this.path },
      }),
    );
    return undefined;
  }

  string(obj: Json, key: string): string | undefined {
    const value = obj[key];
    if (typeof value !== 'string' || value.length === 0) return this.at(key).fail('must be a non-empty string');
    return value;
  }

  optionalString(obj: Json, key: string): string | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') return this.at(key).fail('must be a string');
    return value;
  }

  stringArray(obj: Json, key: string, fallback?: string[]): string[] | undefined {
    const value = obj[key];
    if (value === undefined && fallback) return fallback;
    if (!isStringArray(value)) return this.at(key).fail('must be an array of strings');
    return value;
  }

  optionalStringArray(obj: Json, key: string): string[] | undefined {
    if (obj[key] === undefined) return undefined;
    return this.stringArray(obj, key);
  }

  integer(obj: Json, key: string, fallback: number, min: number, max: number): number {
    const value = obj[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
      this.at(key).fail(`must be an integer between ${min} and ${max}`);
      return fallback;
    }
    return value;
  }
}

/** Parse and validate a pipelines document: `{ "pipelines": [...] }`. */
export function parsePipelineDefinitions(document: unknown): PipelineParseResult {
  const errors: TypedError[] = [];
  const pipelines: PipelineDefinition[] = [];
  const root = new SchemaReader(errors, '$');

  if (!isRecord(document) || !Array.isArray(document.pipelines)) {
    root.fail('document must be an object with a "pipelines" array');
    return { valid: false, pipelines, errors };
  }

  const seenIds = new Set<string>();
  document.pipelines.forEach((raw: unknown, i: number) => {
    const reader = root.at('pipelines').at(i);
    const pipeline = parsePipeline(raw, reader, errors);
    if (!pipeline) return;
    if (seenIds.has(pipeline.id)) {
      reader.at('id').fail(`duplicate pipeline id "${pipeline.id}"`);
      return;
    }
    seenIds.add(pipeline.id);
    pipelines.push(pipeline);
  });

  return { valid: errors.length === 0, pipelines, errors };
}

function parsePipeline(raw: unknown, reader: SchemaReader, errors: TypedError[]): PipelineDefinition | undefined {
  if (!isRecord(raw)) return reader.fail('must be an object');
  const id = reader.string(raw, 'id');
  const name = reader.optionalString(raw, 'name');
  const description = reader.optionalString(raw, 'description');
  if (!id) return undefined;

  if (raw.kind === 'matrix') return parseMatrixPipeline(raw, reader, errors, { id, name: name ?? id, description });
  if (raw.kind === 'image') return parseImagePipeline(raw, reader, { id, name: name ?? id, description });
  return reader.at('kind').fail('must be "matrix" or "image"');
}

function parseMatrixPipeline(
  raw: Json,
  reader: SchemaReader,
  errors: TypedError[],
  base: { id: string; name: string; description?: string },
): MatrixPipeline | undefined {
  const errorCount = errors.length;
  const catalog = parseCatalog(raw.catalog, reader.at('catalog'));
  const targets = parseTargets(raw.targets, reader.at('targets'));
  const combinations = parseCombinations(raw.combinations ?? [], reader.at('combinations'));
  const baseFeatures = reader.stringArray(raw, 'baseFeatures', []);

  let combinationsByTarget: Record<string, string[][]> | undefined;
  if (raw.combinationsByTarget !== undefined) {
    const byTarget = raw.combinationsByTarget;
    if (!isRecord(byTarget)) {
      reader.at('combinationsByTarget').fail('must be an object keyed by target id');
    } else {
      combinationsByTarget = {};
      for (const [targetId, list] of Object.entries(byTarget)) {
        const parsed = parseCombinations(list, reader.at('combinationsByTarget').at(targetId));
        if (parsed) combinationsByTarget[targetId] = parsed;
        if (targets && !targets.some((t) => t.id === targetId)) {
          reader.at('combinationsByTarget').at(targetId).fail('references an unknown target');
        }
      }
    }
  }

  let policy: FailurePolicy = 'fail-fast';
  const rawPolicy = raw.policy;
  if (rawPolicy !== undefined) {
    if (includes(FAILURE_POLICIES, rawPolicy)) policy = rawPolicy;
    else reader.at('policy').fail(`must be one of ${FAILURE_POLICIES.join(', ')}`);
  }
  const concurrency = reader.integer(raw, 'concurrency', 1, 1, SCHEMA_CONSTRAINTS.maxConcurrency);
  const noDefaultFeatures = raw.noDefaultFeatures === true;

  if (catalog) {
    const catalogResult = validateCatalog(catalog);
    errors.push(...catalogResult.errors);
  }

  if (!catalog || !targets || !combinations || !baseFeatures || errors.length > errorCount) return undefined;
  if (combinations.length === 0 && !combinationsByTarget) {
    return reader.at('combinations').fail('at least one combination is required');
  }

  return {
    ...base,
    kind: 'matrix',
    catalog,
    targets,
    combinations,
    combinationsByTarget,
    baseFeatures,
    noDefaultFeatures,
    policy,
    concurrency,
  };
}

function parseCatalog(raw: unknown, reader: SchemaReader): FeatureCatalog | undefined {
  if (!isRecord(raw)) return reader.fail('must be an object');
  if (!Array.isArray(raw.categories)) return reader.at('categories').fail('must be an array');
  if (!Array.isArray(raw.toggles)) return reader.at('toggles').fail('must be an array');

  const categories: FeatureCategory[] = [];
  raw.categories.forEach((entry: unknown, i: number) => {
    const r = reader.at('categories').at(i);
    if (!isRecord(entry)) return r.fail('must be an object');
    const name = r.string(entry, 'name');
    const kind = entry.kind;
    if (!includes(CATEGORY_KINDS, kind)) return r.at('kind').fail('must be "exclusive" or "additive"');
    if (name) {
      categories.push({
        name,
        kind,
        mandatory: entry.mandatory === true,
        description: r.optionalString(entry, 'description'),
      });
    }
    return undefined;
  });

  const toggles: FeatureToggle[] = [];
  raw.toggles.forEach((entry: unknown, i: number) => {
    const r = reader.at('toggles').at(i);
    if (!isRecord(entry)) return r.fail('must be an object');
    const name = r.string(entry, 'name');
    const category = r.string(entry, 'category');
    if (name && category) {
      toggles.push({
        name,
        category,
        platforms: r.optionalStringArray(entry, 'platforms'),
        requires: r.optionalStringArray(entry, 'requires'),
        installs: r.optionalStringArray(entry, 'installs'),
        description: r.optionalString(entry, 'description'),
      });
    }
    return undefined;
  });

  return { categories, toggles };
}

function parseTargets(raw: unknown, reader: SchemaReader): Target[] | undefined {
  if (!Array.isArray(raw) || raw.length === 0) return reader.fail('must be a non-empty array');
  if (raw.length > SCHEMA_CONSTRAINTS.maxTargets) return reader.fail(`must have at most ${SCHEMA_CONSTRAINTS.maxTargets} targets`);

  const targets: Target[] = [];
  const seen = new Set<string>();
  let ok = true;
  raw.forEach((entry: unknown, i: number) => {
    const r = reader.at(i);
    if (!isRecord(entry)) {
      ok = false;
      return r.fail('must be an object');
    }
    const id = r.string(entry, 'id');
    const arch = r.string(entry, 'arch');
    const toolchain = r.string(entry, 'toolchain');
    const os = entry.os;
    if (!includes(TARGET_OSES, os)) {
      ok = false;
      return r.at('os').fail(`must be one of ${TARGET_OSES.join(', ')}`);
    }
    const env = isStringRecord(entry.env) ? entry.env : undefined;
    if (entry.env !== undefined && !env) {
      ok = false;
      return r.at('env').fail('must map names to strings');
    }
    if (!id || !arch || !toolchain) {
      ok = false;
      return undefined;
    }
    if (seen.has(id)) {
      ok = false;
      return r.at('id').fail(`duplicate target id "${id}"`);
    }
    seen.add(id);
    targets.push(
      freezeTarget({
        id,
        os,
        arch,
        toolchain,
        platform: r.optionalString(entry, 'platform') ?? id,
        host: r.optionalString(entry, 'host'),
        crossTarget: entry.crossTarget === true,
        packages: r.optionalStringArray(entry, 'packages'),
        components: r.optionalStringArray(entry, 'components'),
        env,
      }),
    );
    return undefined;
  });

  return ok ? targets : undefined;
}

function parseCombinations(raw: unknown, reader: SchemaReader): string[][] | undefined {
  if (!Array.isArray(raw)) return reader.fail('must be an array of feature lists');
  if (raw.length > SCHEMA_CONSTRAINTS.maxCombinations) {
    return reader.fail(`must have at most ${SCHEMA_CONSTRAINTS.maxCombinations} combinations`);
  }
  const combinations: string[][] = [];
  let ok = true;
  raw.forEach((entry: unknown, i: number) => {
    if (typeof entry === 'string') {
      combinations.push(parseFeatureList(entry));
    } else if (isStringArray(entry)) {
      combinations.push(entry);
    } else {
      ok = false;
      reader.at(i).fail('must be a comma-separated string or an array of toggle names');
    }
  });
  return ok ? combinations : undefined;
}

function parseImagePipeline(
  raw: Json,
  reader: SchemaReader,
  base: { id: string; name: string; description?: string },
): ImagePipeline | undefined {
  const request = parsePublishRequest(raw.request, reader.at('request'));
  const platformConcurrency = reader.integer(raw, 'platformConcurrency', 2, 1, SCHEMA_CONSTRAINTS.maxPlatforms);
  if (!request) return undefined;
  return { ...base, kind: 'image', request, platformConcurrency };
}

/** Parse the publish request of an image pipeline. */
export function parsePublishRequest(raw: unknown, reader: SchemaReader): PublishRequest | undefined {
  if (!isRecord(raw)) return reader.fail('must be an object');
  const context = reader.string(raw, 'context');
  const recipe = reader.string(raw, 'recipe');
  const platforms = reader.stringArray(raw, 'platforms');
  if (platforms) {
    if (platforms.length === 0) reader.at('platforms').fail('must list at least one platform');
    if (platforms.length > SCHEMA_CONSTRAINTS.maxPlatforms) {
      reader.at('platforms').fail(`must list at most ${SCHEMA_CONSTRAINTS.maxPlatforms} platforms`);
    }
    platforms.forEach((p, i) => {
      if (!parsePlatform(p)) reader.at('platforms').at(i).fail(`invalid platform "${p}"`);
    });
  }

  const destinationRaw = raw.destination;
  let destination: PublishRequest['destination'] | undefined;
  if (!isRecord(destinationRaw)) {
    reader.at('destination').fail('must be an object');
  } else {
    const d = reader.at('destination');
    const registry = d.string(destinationRaw, 'registry');
    const repository = d.string(destinationRaw, 'repository');
    const tag = d.string(destinationRaw, 'tag');
    if (repository && repository !== repository.toLowerCase()) d.at('repository').fail('must be lowercase');
    if (registry && repository && tag) destination = { registry, repository, tag };
  }

  const cache = parseCache(raw.cache, reader.at('cache'));
  const buildArgs = isStringRecord(raw.buildArgs) ? raw.buildArgs : undefined;
  if (raw.buildArgs !== undefined && !buildArgs) {
    reader.at('buildArgs').fail('must map names to strings');
    return undefined;
  }

  if (!context || !recipe || !platforms || !destination || !cache) return undefined;
  return { context, recipe, platforms, destination, cache, buildArgs };
}

function parseCache(raw: unknown, reader: SchemaReader): PublishRequest['cache'] | undefined {
  if (raw === undefined) return { from: [] };
  if (!isRecord(raw)) return reader.fail('must be an object');
  const from: CacheReference[] = [];
  const fromRaw = raw.from ?? [];
  if (!Array.isArray(fromRaw)) return reader.at('from').fail('must be an array');
  for (const [i, entry] of fromRaw.entries()) {
    const ref = parseCacheReference(entry, reader.at('from').at(i));
    if (!ref) return undefined;
    from.push(ref);
  }
  const to = raw.to === undefined ? undefined : parseCacheReference(raw.to, reader.at('to'));
  if (raw.to !== undefined && !to) return undefined;
  return { from, to };
}

function parseCacheReference(raw: unknown, reader: SchemaReader): CacheReference | undefined {
  if (!isRecord(raw)) return reader.fail('must be an object');
  const type = reader.string(raw, 'type');
  const ref = reader.optionalString(raw, 'ref');
  const rawMode = raw.mode;
  let mode: CacheReference['mode'];
  if (rawMode === 'min' || rawMode === 'max') mode = rawMode;
  else if (rawMode !== undefined) return reader.at('mode').fail('must be "min" or "max"');
  if (!type) return undefined;
  return { type, ref, mode };
}

