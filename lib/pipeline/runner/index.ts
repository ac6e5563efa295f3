/**
 * Pipeline Runner Module
 *
 * Provides the orchestration layer that drives the pure pipeline stages
 * through a run workspace with state persistence and progress tracking.
 */

export {
  type Progress,
  type ProgressEvent,
  type PipelineDeps,
  type GeneratorContext,
  nullProgress,
  createConsoleProgress,
  createCallbackProgress,
  combineProgress,
  formatStageName,
} from "./types";

export { executeRun, type ExecuteRunOptions } from "./orchestrator";
export { validateRunRequest } from "./request";
export { STAGES, type StageDefinition, type StageContext, type StageSummary } from "./stages";
export { canTransition, isTerminal, transition } from "./state-machine";
export { computeStats } from "./stats";
export {
  getRunStatus,
  listRuns,
  watchRun,
  type RunStatus,
  type RunSummary,
  type StageStatus,
} from "./status";
export {
  ARTIFACT_FILES,
  createWorkspace,
  readArtifact,
  readRunRecord,
  writeArtifact,
} from "./workspace";

// Re-export factory for convenient setup
export { createPipelineDeps } from "./factory";
