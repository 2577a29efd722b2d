export { SourceLister, type SourceListerOptions } from "./source-lister.js";
export {
  StateTransitioner,
  type ProcessedRecord,
  type StateTransitionerOptions,
} from "./state-transitioner.js";
export {
  DocumentStateMachine,
  canTransition,
  isTerminal,
  type StateChangeListener,
} from "./document-state-machine.js";
export { classifyStageError, type StageErrorKind, type StageFailure } from "./stage-errors.js";
export {
  DocumentPipeline,
  type DocumentPipelineDependencies,
  type ExtractFn,
  type ProcessContext,
} from "./document-pipeline.js";
export { RunSummaryBuilder } from "./run-summary.js";
export {
  RunOrchestrator,
  type RunOptions,
  type RunOrchestratorDependencies,
} from "./run-orchestrator.js";
