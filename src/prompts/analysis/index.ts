export { type IncrementalAnalysisInput, incrementalAnalysisPrompt } from './incremental';
export { type InitialAnalysisInput, initialAnalysisPrompt } from './initial';
export { SYSTEM_INSTRUCTION } from './shared';
