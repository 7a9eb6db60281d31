export {
  OpenAICompatibleTransport,
  type OpenAICompatibleConfig,
  normalizeBaseUrl,
  toWireRequest,
} from "./provider";
export { classifyHttpFailure, classifyNetworkError, buildErrorHint } from "./errors";
export {
  type WireMessage,
  type WireToolDef,
  type WireToolCall,
  type WireChatRequest,
  type WireChatResponse,
  type WireResponseFormat,
  WireChatResponseSchema,
  WireEmbeddingResponseSchema,
  WireErrorBodySchema,
} from "./wire";
