/**
 * Chat Model Types
 *
 * Core type definitions for the chat model port consumed by the advisor chain.
 * A model answers a whole prompt at once (`call`), as a lazy sequence of
 * partial responses (`stream`), or as plain text in, text out (`callText`).
 */

/** Message role in conversation */
export type MessageRole = "system" | "user" | "assistant";

/** Chat message */
export interface Message {
  /** Message role */
  role: MessageRole;
  /** Message content */
  content: string;
}

/** Token usage statistics */
export interface TokenUsage {
  /** Input/prompt tokens */
  inputTokens: number;
  /** Output/completion tokens */
  outputTokens: number;
  /** Total tokens */
  totalTokens: number;
}

/** Why the model stopped generating */
export type FinishReason = "stop" | "length" | "content_filter" | "tool_calls" | "error" | "unknown";

/** Per-call model options */
export interface ChatOptions {
  /** Model identifier */
  model?: string;
  /** Temperature (0-2) */
  temperature?: number;
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** Top-p sampling */
  topP?: number;
  /** Stop sequences */
  stopSequences?: string[];
}

/** Input to a chat model */
export interface Prompt {
  /** Ordered conversation messages */
  messages: Message[];
  /** Model options */
  options?: ChatOptions;
}

/** One candidate answer */
export interface Generation {
  /** Generated text (a delta when part of a stream) */
  content: string;
  /** Finish reason, when known */
  finishReason?: FinishReason;
}

/** Response metadata */
export interface ChatResponseMetadata {
  /** Model used */
  model?: string;
  /** Token usage */
  usage?: TokenUsage;
  /** Values attached by advisors on the response leg */
  annotations?: Record<string, unknown>;
}

/**
 * Chat response.
 * When produced by `stream`, each element carries a text delta and the
 * full answer is the concatenation of the deltas in emission order.
 */
export interface ChatResponse {
  /** Candidate answers; advisors only read the first */
  generations: Generation[];
  /** Response metadata */
  metadata: ChatResponseMetadata;
}

/**
 * Chat Model
 *
 * The model collaborator invoked once per advised request.
 */
export interface ChatModel {
  /** Model name, used in logs */
  readonly name: string;

  /**
   * Answer a prompt.
   */
  call(prompt: Prompt): Promise<ChatResponse>;

  /**
   * Answer a prompt as a lazy sequence of partial responses.
   * Nothing is requested from the model until the sequence is iterated.
   */
  stream(prompt: Prompt): AsyncIterable<ChatResponse>;

  /**
   * Text in, text out. Used for auxiliary calls that must not re-enter the advisor chain.
   */
  callText(text: string): Promise<string>;
}

/** Chat model request metrics */
export interface ChatModelMetrics {
  /** Model name */
  model: string;
  /** Total requests */
  totalRequests: number;
  /** Successful requests */
  successfulRequests: number;
  /** Failed requests */
  failedRequests: number;
  /** Total input tokens */
  totalInputTokens: number;
  /** Total output tokens */
  totalOutputTokens: number;
  /** Average latency in ms */
  avgLatencyMs: number;
}
