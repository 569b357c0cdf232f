/**
 * Orchestrator states.
 *
 * idle -> resolving -> processing -> persisting -> processing ... -> completed
 * Any processing step may end in aborted (caller request) or failed
 * (provider error with nothing to fall back on).
 */

export type AnalysisState =
  | 'idle'
  | 'resolving'
  | 'processing'
  | 'persisting'
  | 'completed'
  | 'aborted'
  | 'failed';

export const STATE_LABELS: Record<AnalysisState, string> = {
  idle: 'Waiting to start...',
  resolving: 'Looking for earlier progress...',
  processing: 'Reading the next passage...',
  persisting: 'Saving progress...',
  completed: 'Analysis complete',
  aborted: 'Analysis stopped',
  failed: 'Analysis failed',
};

export function getStateLabel(state: AnalysisState): string {
  return STATE_LABELS[state];
}
