// @toolplan/core: contract types plus registry, gateway and planner
// Re-exports all types, interfaces, and core logic

// Types
export * from "./types";

// Identity
export { generateId } from "./id";

// Introspection
export {
  UNKNOWN_SOURCE,
  describeCallable,
  extractParameterList,
  splitParameters,
  parseParameter,
  resolveCallerFile,
  moduleIdentifier,
} from "./introspect";

// Schemas + tool blocks
export {
  type StructuredShape,
  type ToolSchemaWire,
  type DynamicPlanWire,
  type DynamicPlanTracerWire,
  ToolParameterSchema,
  ToolSchemaSchema,
  PlanStepSchema,
  RecommendedToolSchema,
  DynamicPlanSchema,
  DynamicPlanContainerSchema,
  TOOL_SCHEMA_SHAPE,
  DYNAMIC_PLAN_CONTAINER_SHAPE,
  defineShape,
  toToolSchema,
  toDynamicPlan,
  toTracerWire,
} from "./schemas";
export { renderToolBlock, parseToolBlock } from "./tool-block";

// Prompts
export {
  MULTI_LANGUAGE_INSTRUCTION,
  STRUCTURED_OUTPUT_INSTRUCTION,
  TOOL_CALLING_INSTRUCTION,
  CODE_SUMMARY_INSTRUCTION,
  DYNAMIC_PLAN_INSTRUCTION,
  type FunctionPromptInput,
  buildFunctionPrompt,
} from "./prompts";

// Pools
export { AbstractWorkerPool, ThreadPool, ProcessPool, type PoolOptions } from "./pools";

// Gateway
export {
  type GatewayModels,
  type LlmGatewayOptions,
  type GatewayRequestOptions,
  type DescribeToolHints,
  type FunctionCallOutcome,
  DEFAULT_MODELS,
  LlmGateway,
  toFunctionDeclaration,
} from "./llm-gateway";

// Tool registry
export { type ToolDescriber, type ToolRegistryOptions, DEFAULT_PREFIX, ToolRegistry } from "./tool-registry";

// Planning
export {
  type PlanRequester,
  type PlanGeneratorOptions,
  NO_AGENTS_DESCRIPTION,
  DEFAULT_PLAN_MAX_TOKENS,
  PlanGenerator,
  buildPlanPrompt,
  toTracer,
} from "./plan-generator";
export { MAX_STEP_RETRY, enforceExclusivity, pruneByScoreGap } from "./plan-validation";

// Agent
export { type AgentDeps, type AgentStatus, Agent } from "./agent";

// Config
export { type ToolplanConfig, DEFAULT_BASE_URL, loadConfig } from "./config";
