/**
 * Pipeline definitions.
 *
 * A pipeline is what an operator triggers by name: either a static-build
 * matrix over targets and feature combinations, or a container image
 * publish. Definitions are data, loaded from configuration.
 */

import { FeatureCatalog } from './feature';
import { PublishRequest } from './image';
import { Target } from './target';

/** Scheduler policy after the first failed job. */
export type FailurePolicy = 'fail-fast' | 'fail-continue';

export const FAILURE_POLICIES: readonly FailurePolicy[] = ['fail-fast', 'fail-continue'];

export type PipelineKind = 'matrix' | 'image';

interface PipelineBase {
  id: string;
  name: string;
  kind: PipelineKind;
  description?: string;
}

export interface MatrixPipeline extends PipelineBase {
  kind: 'matrix';
  catalog: FeatureCatalog;
  targets: Target[];
  /** Candidate combinations applied to every target. */
  combinations: string[][];
  /**
   * Candidate combinations for specific targets, keyed by target id.
   * A target listed here uses these instead of `combinations`.
   */
  combinationsByTarget?: Record<string, string[][]>;
  /** Toggles appended to every combination. */
  baseFeatures: string[];
  /** Switch off the toolchain's default features. */
  noDefaultFeatures: boolean;
  policy: FailurePolicy;
  concurrency: number;
}

export interface ImagePipeline extends PipelineBase {
  kind: 'image';
  request: PublishRequest;
  /** Per-architecture builds running at once. */
  platformConcurrency: number;
}

export type PipelineDefinition = MatrixPipeline | ImagePipeline;

export function isMatrixPipeline(pipeline: PipelineDefinition): pipeline is MatrixPipeline {
  return pipeline.kind === 'matrix';
}
