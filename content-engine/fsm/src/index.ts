// Pipeline exports

export { AssignmentPipeline } from './pipeline.js';
export type { PipelineStage, PipelineHooks, PipelineResult, PipelineDependencies } from './pipeline.js';
export { createAppState, recordGeneration, toStudentInfo } from './app-state.js';
export type { AppState, GeneratedDocument, HistoryRecord } from './app-state.js';
export { createPipelineServices } from './factory.js';
export type { PipelineServices } from './factory.js';
