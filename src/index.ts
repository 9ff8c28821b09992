export { ConversationState } from "./conductor/conversation.js";
export type { Message, MessageRole, NewMessage } from "./conductor/conversation.js";

export { AgentExecutor } from "./conductor/agents/executor.js";
export type { AgentReply, InvokeOptions } from "./conductor/agents/executor.js";

export {
  WorkflowError,
  AgentInvocationError,
  InvalidTransitionError,
  InvalidConfigurationError,
  ConfigurationError,
  WORKFLOW_ERROR_CODES,
  toWorkflowError
} from "./conductor/errors.js";
export type { WorkflowErrorCode, AgentInvocationReason } from "./conductor/errors.js";

export { loadConfig, DEFAULT_RUN_DEFAULTS } from "./conductor/config.js";
export type { AppConfig, LlmSettings, RunDefaults } from "./conductor/config.js";

export { createLogger, logger } from "./conductor/logger.js";

export * from "./conductor/llm/index.js";

export * from "./conductor/orchestrator/types.js";
export { WorkflowRun, isTerminalStatus } from "./conductor/orchestrator/run.js";
export { SequentialOrchestrator, sequentialConfig } from "./conductor/orchestrator/sequential.js";
export {
  HumanInLoopOrchestrator,
  humanInLoopConfig,
  formatDecision,
  DEFAULT_GATE_PROMPT,
  DEFAULT_GATE_STEP
} from "./conductor/orchestrator/humanInLoop.js";
export type { HumanInLoopOptions } from "./conductor/orchestrator/humanInLoop.js";
export {
  RoundRobinOrchestrator,
  roundRobinConfig,
  DEFAULT_SYNTHESIS_INSTRUCTIONS
} from "./conductor/orchestrator/roundRobin.js";
export type { RoundRobinOptions } from "./conductor/orchestrator/roundRobin.js";
export type { OrchestratorDeps } from "./conductor/orchestrator/base.js";

export * from "./conductor/store/index.js";
export * from "./conductor/presets.js";

export { WorkflowRunner, isTopology, isVerdict } from "./conductor/runner.js";
export type { StartOptions, WorkflowRunnerOptions, RunnerStats } from "./conductor/runner.js";

export { createHttpApp, startHttpServer, httpStatusFor } from "./server/http.js";
export { createMcpServer } from "./mcp/server.js";
