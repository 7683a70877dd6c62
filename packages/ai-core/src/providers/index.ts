/**
 * Chat Model Providers
 *
 * The chat model port consumed by the advisor chain, a base class with
 * metrics and retries, and a Vercel AI SDK implementation covering
 * OpenAI, Anthropic, and Google models.
 */

// ============================================================================
// Base Chat Model
// ============================================================================
export { BaseChatModel, type BaseChatModelConfig } from "./baseChatModel";
// ============================================================================
// Response Helpers
// ============================================================================
export {
  annotateResponse,
  contentOf,
  createChatResponse,
  mergeChatResponses,
} from "./responses";
// ============================================================================
// Types
// ============================================================================
export type {
  ChatModel,
  ChatModelMetrics,
  ChatOptions,
  ChatResponse,
  ChatResponseMetadata,
  FinishReason,
  Generation,
  Message,
  MessageRole,
  Prompt,
  TokenUsage,
} from "./types";
// ============================================================================
// Vercel AI SDK
// ============================================================================
export {
  createVercelChatModel,
  VercelChatModel,
  type VercelChatModelConfig,
  type VercelProviderType,
} from "./vercelChatModel";
