/**
 * Base Chat Model
 *
 * Abstract base class with shared functionality for chat models.
 * Handles metrics tracking, retries and the text-in/text-out form.
 */

import { contentOf } from "./responses";
import type { ChatModel, ChatModelMetrics, ChatResponse, Prompt, TokenUsage } from "./types";

export interface BaseChatModelConfig {
  /** Retries for a failed `call` (default: 0) */
  maxRetries?: number;
  /** Upper bound for the exponential backoff delay in ms (default: 10000) */
  maxRetryDelayMs?: number;
}

const DEFAULT_CONFIG: Required<BaseChatModelConfig> = {
  maxRetries: 0,
  maxRetryDelayMs: 10000,
};

/**
 * Abstract base class for chat models.
 * Subclasses implement `doCall` and `doStream`.
 */
export abstract class BaseChatModel implements ChatModel {
  abstract readonly name: string;

  protected readonly config: Required<BaseChatModelConfig>;
  private totalRequests = 0;
  private successfulRequests = 0;
  private failedRequests = 0;
  private totalInputTokens = 0;
  private totalOutputTokens = 0;
  private totalLatencyMs = 0;

  constructor(config: BaseChatModelConfig = {}) {
    this.config = {
      maxRetries: config.maxRetries ?? DEFAULT_CONFIG.maxRetries,
      maxRetryDelayMs: config.maxRetryDelayMs ?? DEFAULT_CONFIG.maxRetryDelayMs,
    };
  }

  protected abstract doCall(prompt: Prompt): Promise<ChatResponse>;

  protected abstract doStream(prompt: Prompt): AsyncIterable<ChatResponse>;

  async call(prompt: Prompt): Promise<ChatResponse> {
    const startTime = Date.now();
    try {
      const response = await this.withRetry(() => this.doCall(prompt));
      this.trackSuccess(response.metadata.usage, Date.now() - startTime);
      return response;
    } catch (error) {
      this.trackFailure();
      throw error;
    }
  }

  async *stream(prompt: Prompt): AsyncGenerator<ChatResponse, void, undefined> {
    const startTime = Date.now();
    let usage: TokenUsage | undefined;
    try {
      for await (const chunk of this.doStream(prompt)) {
        usage = chunk.metadata.usage ?? usage;
        yield chunk;
      }
    } catch (error) {
      this.trackFailure();
      throw error;
    }
    this.trackSuccess(usage, Date.now() - startTime);
  }

  async callText(text: string): Promise<string> {
    const response = await this.call({ messages: [{ role: "user", content: text }] });
    return contentOf(response);
  }

  getMetrics(): ChatModelMetrics {
    return {
      model: this.name,
      totalRequests: this.totalRequests,
      successfulRequests: this.successfulRequests,
      failedRequests: this.failedRequests,
      totalInputTokens: this.totalInputTokens,
      totalOutputTokens: this.totalOutputTokens,
      avgLatencyMs: this.successfulRequests > 0 ? this.totalLatencyMs / this.successfulRequests : 0,
    };
  }

  resetMetrics(): void {
    this.totalRequests = 0;
    this.successfulRequests = 0;
    this.failedRequests = 0;
    this.totalInputTokens = 0;
    this.totalOutputTokens = 0;
    this.totalLatencyMs = 0;
  }

  private trackSuccess(usage: TokenUsage | undefined, latencyMs: number): void {
    this.totalRequests++;
    this.successfulRequests++;
    this.totalInputTokens += usage?.inputTokens ?? 0;
    this.totalOutputTokens += usage?.outputTokens ?? 0;
    this.totalLatencyMs += latencyMs;
  }

  private trackFailure(): void {
    this.totalRequests++;
    this.failedRequests++;
  }

  /**
   * Retry an operation with exponential backoff.
   */
  protected async withRetry<T>(operation: () => Promise<T>): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error;

        if (this.isNonRetriableError(error)) {
          throw error;
        }

        if (attempt < this.config.maxRetries) {
          const delay = Math.min(1000 * 2 ** attempt, this.config.maxRetryDelayMs);
          await this.sleep(delay);
        }
      }
    }

    throw lastError;
  }

  /**
   * Check if an error is non-retriable.
   */
  protected isNonRetriableError(error: unknown): boolean {
    const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
    return (
      message.includes("invalid api key") ||
      message.includes("authentication") ||
      message.includes("unauthorized") ||
      message.includes("forbidden") ||
      message.includes("invalid request")
    );
  }

  protected sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
