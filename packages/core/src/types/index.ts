// Barrel export: the public type surface of @toolplan/core

export type {
  ChatRole,
  ChatMessage,
  AssistantMessage,
  ChatInput,
} from "./message";

export type {
  ChatTransport,
  ChatRequest,
  ChatChoice,
  ChatCompletion,
  ResponseFormat,
} from "./transport";

export type {
  ToolParameter,
  ToolSchema,
  ToolCallable,
  ToolInvoker,
  OffloadStrategy,
  RegisterOptions,
  InvocationVariant,
  PendingRegistration,
  RegisteredTool,
  CallableParameter,
  CallableInfo,
  FunctionDeclaration,
  ToolCall,
} from "./tool";

export type {
  PlanStep,
  RecommendedTool,
  DynamicPlan,
  DynamicPlanContainer,
  DynamicPlanTracer,
  PlanExclusivityMode,
} from "./plan";

export type { WorkerPool } from "./pool";

export type {
  Lifecycle,
  LifecycleStatus,
} from "./lifecycle";

export type {
  Logger,
  LogLevel,
  ConsoleLoggerOptions,
} from "./logger";
export { ConsoleLogger, LOG_LEVELS, silentLogger, describeError } from "./logger";

export {
  ToolplanError,
  InvalidInputError,
  PoolNotInitializedError,
  PoolClosedError,
  RefusalError,
  TokenLimitError,
  TransientGatewayError,
  PlanGenerationError,
  ConfigError,
  ok,
  err,
} from "./errors";
export type { Result, PoolKind, GatewayErrorCode } from "./errors";
