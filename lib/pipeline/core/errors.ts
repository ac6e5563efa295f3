/**
 * Error taxonomy for the pipeline.
 *
 * Stage-fatal errors carry a `kind` that ends up in the run record's
 * `failure.kind`; per-record degradations are never thrown, they are
 * annotated on the record or counted in the stage result instead.
 */

import type { ArtifactName, RunState, StageName } from "./schemas";

export type PipelineErrorKind =
  | "ConfigurationError"
  | "UpstreamArtifactMissing"
  | "ArtifactExists"
  | "InvalidTransition"
  | "GenerationTimeout"
  | "StageError";

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
  }
}

/** Invalid submission: rejected before any stage starts. */
export class ConfigurationError extends PipelineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("ConfigurationError", `Invalid run configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class UpstreamArtifactMissing extends PipelineError {
  readonly artifact: ArtifactName;

  constructor(artifact: ArtifactName, detail: string) {
    super("UpstreamArtifactMissing", `Upstream artifact "${artifact}" unusable: ${detail}`);
    this.artifact = artifact;
  }
}

export class ArtifactExistsError extends PipelineError {
  readonly artifact: ArtifactName;

  constructor(artifact: ArtifactName, filePath: string) {
    super("ArtifactExists", `Refusing to overwrite existing artifact: ${filePath}`);
    this.artifact = artifact;
  }
}

export class InvalidTransitionError extends PipelineError {
  constructor(from: RunState, to: RunState) {
    super("InvalidTransition", `Illegal run transition ${from} -> ${to}`);
  }
}

export class GenerationTimeout extends PipelineError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super("GenerationTimeout", `LLM call exceeded ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

/** Wraps anything a stage throws that is not already a PipelineError. */
export class StageError extends PipelineError {
  readonly stage: StageName;

  constructor(stage: StageName, cause: unknown) {
    super("StageError", cause instanceof Error ? cause.message : String(cause), { cause });
    this.stage = stage;
  }
}

export function toPipelineError(stage: StageName, err: unknown): PipelineError {
  return err instanceof PipelineError ? err : new StageError(stage, err);
}
