export {
  AnalysisOrchestrator,
  type OrchestratorOptions,
  percentMarker,
  resumeOffset,
} from './orchestrator';
export { type AnalysisState, getStateLabel, STATE_LABELS } from './states';
export { AnalysisTask, type TaskContext } from './task';
export type {
  AnalysisOutcome,
  AnalysisRequest,
  ExtractionClient,
  ProgressDecision,
  ProgressEvent,
} from './types';
