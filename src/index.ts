export { AutobuildEngine } from './orchestrator/engine';
export type { EngineDependencies, EngineSettings, WorkflowRunResult } from './orchestrator/engine';
export { WorkflowOrchestrator } from './orchestrator/workflow';
export type { WorkflowResult, WorkflowStatus, VerificationSummary } from './orchestrator/workflow';
export { InteractiveSession } from './orchestrator/interactive';
export type { TurnResult, FileChange } from './orchestrator/interactive';
export { compileWorkflow, toMermaid } from './orchestrator/graph';
export type { CompiledWorkflow, GraphDescription, GraphEdge } from './orchestrator/graph';
export { WORKFLOW_GRAPH } from './orchestrator/transitions';
export { WorkflowState } from './orchestrator/workflow-state';
export type { VerificationReport, WorkflowStateSnapshot } from './orchestrator/workflow-state';
export { validateStageOutput } from './agents/output-contract';
export { StageExecutor } from './agents/stage-executor';
export type { StageResult } from './agents/stage-executor';
export { CompletenessVerificationLoop } from './agents/verification-loop';
export type { VerificationOutcome } from './agents/verification-loop';
export type { LlmCollaborator } from './agents/llm-collaborator';
export type { SandboxExecutionClient, SandboxProvider, SandboxSession } from './testing/types';
export { loadConfig } from './config/loader';
export * from './orchestrator/errors';
