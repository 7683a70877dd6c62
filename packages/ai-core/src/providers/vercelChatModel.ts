/**
 * Vercel AI SDK Chat Model
 *
 * Chat model backed by Vercel AI SDK Core.
 * Supports OpenAI, Anthropic, and Google models, or any injected
 * `LanguageModel` (including the SDK's test doubles).
 *
 * @module providers/vercelChatModel
 */

import { createAnthropic } from "@ai-sdk/anthropic";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAI } from "@ai-sdk/openai";
import {
  type FinishReason as SdkFinishReason,
  type LanguageModel,
  type LanguageModelUsage,
  type ModelMessage,
  generateText,
  streamText,
} from "ai";
import { errorMessage } from "../errors";
import { type AdvisorLogger, createNoopLogger } from "../logging";
import { type BaseChatModelConfig, BaseChatModel } from "./baseChatModel";
import { createChatResponse } from "./responses";
import type { ChatResponse, FinishReason, Message, Prompt, TokenUsage } from "./types";

/**
 * Supported provider types
 */
export type VercelProviderType = "openai" | "anthropic" | "google";

interface VercelModelSettings extends BaseChatModelConfig {
  /** Receives stream errors reported by the SDK */
  logger?: AdvisorLogger;
}

interface ProviderModelConfig extends VercelModelSettings {
  /** Provider type */
  provider: VercelProviderType;
  /** API key */
  apiKey: string;
  /** Base URL override (optional) */
  baseUrl?: string;
  /** Default model */
  defaultModel?: string;
}

interface InjectedModelConfig extends VercelModelSettings {
  /** Pre-built SDK model; per-call `model` options are ignored */
  model: LanguageModel;
  /** Model name used in logs and metrics */
  name?: string;
}

export type VercelChatModelConfig = ProviderModelConfig | InjectedModelConfig;

const DEFAULT_MODELS: Record<VercelProviderType, string> = {
  openai: "gpt-4o-mini",
  anthropic: "claude-3-5-haiku-latest",
  google: "gemini-2.0-flash",
};

type ModelFactory = (modelId?: string) => LanguageModel;

function createModelFactory(config: ProviderModelConfig): ModelFactory {
  const defaultModel = config.defaultModel ?? DEFAULT_MODELS[config.provider];
  const settings = { apiKey: config.apiKey, baseURL: config.baseUrl };

  switch (config.provider) {
    case "openai": {
      const provider = createOpenAI(settings);
      return (modelId) => provider(modelId ?? defaultModel);
    }
    case "anthropic": {
      const provider = createAnthropic(settings);
      return (modelId) => provider(modelId ?? defaultModel);
    }
    case "google": {
      const provider = createGoogleGenerativeAI(settings);
      return (modelId) => provider(modelId ?? defaultModel);
    }
  }
}

function modelIdOf(model: LanguageModel): string {
  return typeof model === "string" ? model : model.modelId;
}

/**
 * Vercel AI SDK chat model.
 */
export class VercelChatModel extends BaseChatModel {
  readonly name: string;

  private readonly resolveModel: ModelFactory;
  private readonly logger: AdvisorLogger;

  constructor(config: VercelChatModelConfig) {
    super({ maxRetries: config.maxRetries, maxRetryDelayMs: config.maxRetryDelayMs });
    this.logger = config.logger ?? createNoopLogger();

    if ("model" in config) {
      const model = config.model;
      this.name = config.name ?? modelIdOf(model);
      this.resolveModel = () => model;
    } else {
      this.name = `vercel-${config.provider}`;
      this.resolveModel = createModelFactory(config);
    }
  }

  protected async doCall(prompt: Prompt): Promise<ChatResponse> {
    const model = this.resolveModel(prompt.options?.model);
    const result = await generateText({
      ...this.callSettings(prompt),
      model,
    });

    return createChatResponse(
      result.text,
      { model: result.response.modelId, usage: toTokenUsage(result.usage) },
      mapFinishReason(result.finishReason)
    );
  }

  protected async *doStream(prompt: Prompt): AsyncGenerator<ChatResponse, void, undefined> {
    const model = this.resolveModel(prompt.options?.model);
    const modelId = modelIdOf(model);
    const result = streamText({
      ...this.callSettings(prompt),
      model,
      // Error parts still reach fullStream and are rethrown there.
      onError: ({ error }) => {
        this.logger.warn("Model stream error", { model: modelId, error: errorMessage(error) });
      },
    });

    for await (const part of result.fullStream) {
      switch (part.type) {
        case "text-delta":
          yield createChatResponse(part.text, { model: modelId });
          break;
        case "error":
          throw part.error;
        case "finish":
          yield createChatResponse(
            "",
            { model: modelId, usage: toTokenUsage(part.totalUsage) },
            mapFinishReason(part.finishReason)
          );
          break;
        default:
          break;
      }
    }
  }

  private callSettings(prompt: Prompt) {
    const options = prompt.options ?? {};
    return {
      messages: prompt.messages.map(toModelMessage),
      temperature: options.temperature,
      maxOutputTokens: options.maxTokens,
      topP: options.topP,
      stopSequences: options.stopSequences,
      // Retries are handled by BaseChatModel
      maxRetries: 0,
    };
  }
}

// --- Helpers ---

function toModelMessage(message: Message): ModelMessage {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

function toTokenUsage(usage: LanguageModelUsage): TokenUsage {
  const inputTokens = usage.inputTokens ?? 0;
  const outputTokens = usage.outputTokens ?? 0;
  return {
    inputTokens,
    outputTokens,
    totalTokens: usage.totalTokens ?? inputTokens + outputTokens,
  };
}

function mapFinishReason(reason: SdkFinishReason): FinishReason {
  switch (reason) {
    case "stop":
      return "stop";
    case "length":
      return "length";
    case "content-filter":
      return "content_filter";
    case "tool-calls":
      return "tool_calls";
    case "error":
      return "error";
    default:
      return "unknown";
  }
}

export function createVercelChatModel(config: VercelChatModelConfig): VercelChatModel {
  return new VercelChatModel(config);
}
