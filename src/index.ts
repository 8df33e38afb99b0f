// Config
export { getConfig, configure, resetConfig, defaults } from "./config.js";
export type { EngineConfig, ConfigOverrides } from "./config.js";

// Errors
export {
  EngineError,
  DefinitionError,
  DuplicateTaskError,
  DependencyReferenceError,
  CycleError,
  ConditionError,
  TimeoutError,
  ExecutorError,
  CancelledError,
  RegistrationError,
  ConfigError,
  errorMessage,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  formatIssues,
  ToolSpecSchema,
  WorkflowDefinitionSchema,
  SubmitWorkflowRequestSchema,
  MAX_TIMEOUT_SECONDS,
} from "./schemas.js";
export type { ToolSpec, WorkflowDefinitionInput, SubmitWorkflowRequest } from "./schemas.js";

// Graph
export { parseWorkflow, loadWorkflowFile } from "./graph/loader.js";
export {
  validateWorkflow,
  topologicalSort,
  readinessWaves,
  waveIndexes,
  descendants,
  estimateDurationSeconds,
} from "./graph/task-graph.js";
export { compileCondition } from "./graph/condition.js";
export type { CompiledCondition, ConditionNode, OutputLookup } from "./graph/condition.js";
export type {
  Task,
  TaskData,
  TaskGraph,
  TaskState,
  TaskStatus,
  TaskError,
  TaskErrorKind,
  SkipReason,
  WorkflowDefinition,
  WorkflowResult,
  WorkflowStatus,
} from "./graph/types.js";

// Engine
export { Engine } from "./engine/engine.js";
export { ExecutionContext } from "./engine/context.js";
export { aggregate, workflowStatus } from "./engine/aggregator.js";
export { toHumanReadable, toAgentFormat } from "./engine/report.js";
export type { AgentReport, AgentTaskReport } from "./engine/report.js";
export type {
  ActiveRun,
  EngineOptions,
  ExecutionRequest,
  ProgressEvent,
  RunOptions,
  TaskExecutor,
} from "./engine/types.js";

// Tools
export type { ToolAdapter } from "./tools/adapter.js";
export { ToolRegistry } from "./tools/registry.js";
export type { ToolHealth } from "./tools/registry.js";
export { HttpAdapter } from "./tools/http-adapter.js";
export type { HttpAdapterOptions } from "./tools/http-adapter.js";
export { FunctionAdapter } from "./tools/function-adapter.js";
export type { FunctionAdapterOptions, ToolFunction } from "./tools/function-adapter.js";

// Persistence
export { RunStore } from "./persistence/store.js";
export type { RunSummary } from "./persistence/store.js";

// Server
export { WorkflowServer } from "./server/server.js";
export type { WorkflowServerOptions } from "./server/server.js";
export type { RunRecord, SSEEvent } from "./server/types.js";

// Utils
export { log, setLogLevel } from "./utils/logger.js";
export type { LogLevel } from "./utils/logger.js";
export { withRetry, backoffDelay, sleep } from "./utils/retry.js";
export type { RetryOptions } from "./utils/retry.js";
export { withTimeout } from "./utils/timeout.js";
