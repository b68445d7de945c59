export { createExecutor } from './function-executor.js';
export type { ExecutorFunction } from './function-executor.js';
export { AgentPipelineAdapter } from './agent-pipeline.js';
export type {
  AgentPipeline,
  AgentPipelineAdapterOptions,
  PipelineContext,
  PipelineRunResult,
  PipelineStepResult,
  PipelineToolCall,
} from './agent-pipeline.js';
