/**
 * Chat response helpers.
 */

import type { ChatResponse, ChatResponseMetadata, FinishReason, TokenUsage } from "./types";

/**
 * Create a single-generation response.
 */
export function createChatResponse(
  content: string,
  metadata: ChatResponseMetadata = {},
  finishReason?: FinishReason
): ChatResponse {
  return {
    generations: [{ content, finishReason }],
    metadata,
  };
}

/**
 * Text of the first generation, or "" when the response has none.
 */
export function contentOf(response: ChatResponse): string {
  return response.generations[0]?.content ?? "";
}

/**
 * Fold streamed partial responses into one response.
 * Text deltas are concatenated in order; the last non-empty finish reason,
 * model and usage win; annotations are merged with later values overriding.
 */
export function mergeChatResponses(chunks: ChatResponse[]): ChatResponse {
  let content = "";
  let finishReason: FinishReason | undefined;
  let model: string | undefined;
  let usage: TokenUsage | undefined;
  let annotations: Record<string, unknown> | undefined;

  for (const chunk of chunks) {
    const generation = chunk.generations[0];
    if (generation) {
      content += generation.content;
      finishReason = generation.finishReason ?? finishReason;
    }
    model = chunk.metadata.model ?? model;
    usage = chunk.metadata.usage ?? usage;
    if (chunk.metadata.annotations) {
      annotations = { ...annotations, ...chunk.metadata.annotations };
    }
  }

  const metadata: ChatResponseMetadata = {};
  if (model !== undefined) {
    metadata.model = model;
  }
  if (usage !== undefined) {
    metadata.usage = usage;
  }
  if (annotations !== undefined) {
    metadata.annotations = annotations;
  }
  return createChatResponse(content, metadata, finishReason);
}

/**
 * Return a copy of `response` with extra annotations merged into its metadata.
 */
export function annotateResponse(
  response: ChatResponse,
  annotations: Record<string, unknown>
): ChatResponse {
  return {
    ...response,
    metadata: {
      ...response.metadata,
      annotations: { ...response.metadata.annotations, ...annotations },
    },
  };
}
