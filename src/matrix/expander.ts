/**
 * Matrix Expander.
 *
 * Cross-products targets with candidate feature combinations, filters every
 * pair through the validator, and emits build jobs in a canonical order
 * (target id, then combination key) with ids derived from their content, so
 * logs and reruns line up run over run.
 */

import { createHash } from 'crypto';
import { FeatureCatalog, canonicalizeCombination, findToggle } from '../domain/feature';
import { BuildJob, MatrixRejection } from '../domain/job';
import { Target, compareTargets } from '../domain/target';
import { validateCombination } from './validator';

export interface MatrixExpansionInput {
  catalog: FeatureCatalog;
  targets: Target[];
  combinations: ReadonlyArray<readonly string[]>;
  combinationsByTarget?: Record<string, ReadonlyArray<readonly string[]>>;
  baseFeatures?: readonly string[];
  noDefaultFeatures?: boolean;
}

export interface MatrixExpansion {
  jobs: BuildJob[];
  rejections: MatrixRejection[];
}

/** Derive the stable job id for a target and canonical combination key. */
export function computeJobId(targetId: string, combinationKey: string): string {
  const digest = createHash('sha256').update(`${targetId}\n${combinationKey}`).digest('hex');
  return `job_${digest.slice(0, 16)}`;
}

/** Expand a matrix into build jobs and rejections. */
export function expandMatrix(input: MatrixExpansionInput): MatrixExpansion {
  const { catalog } = input;
  const baseFeatures = input.baseFeatures ?? [];
  const jobs: BuildJob[] = [];
  const rejections: MatrixRejection[] = [];

  for (const target of [...input.targets].sort(compareTargets)) {
    const candidates = input.combinationsByTarget?.[target.id] ?? input.combinations;

    const byKey = new Map<string, string[]>();
    for (const candidate of candidates) {
      const canonical = canonicalizeCombination(catalog, [...candidate, ...baseFeatures]);
      byKey.set(canonical.join(','), canonical);
    }

    const keys = [...byKey.keys()].sort();
    for (const key of keys) {
      const combination = byKey.get(key) ?? [];
      const verdict = validateCombination(catalog, combination, target.platform);
      if (!verdict.valid) {
        rejections.push({
          targetId: target.id,
          combination,
          reason: verdict.reason,
          code: verdict.code,
        });
        continue;
      }

      jobs.push({
        id: computeJobId(target.id, key),
        index: jobs.length,
        target,
        combination,
        combinationKey: key,
        noDefaultFeatures: input.noDefaultFeatures ?? false,
        extraPackages: collectInstalls(catalog, combination),
      });
    }
  }

  return { jobs, rejections };
}

function collectInstalls(catalog: FeatureCatalog, combination: string[]): string[] {
  const packages: string[] = [];
  for (const name of combination) {
    for (const pkg of findToggle(catalog, name)?.installs ?? []) {
      if (!packages.includes(pkg)) packages.push(pkg);
    }
  }
  return packages;
}
