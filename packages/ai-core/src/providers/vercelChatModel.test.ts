import { simulateReadableStream } from "ai";
import { MockLanguageModelV2 } from "ai/test";
import { describe, expect, it, vi } from "vitest";
import { collectStream } from "../advisors/streams";
import { createNoopLogger } from "../logging";
import { contentOf, mergeChatResponses } from "./responses";
import { VercelChatModel } from "./vercelChatModel";

function generatingModel(text: string) {
  return new MockLanguageModelV2({
    modelId: "test-model",
    doGenerate: async () => ({
      finishReason: "stop",
      usage: { inputTokens: 10, outputTokens: 20, totalTokens: 30 },
      content: [{ type: "text", text }],
      warnings: [],
    }),
  });
}

function streamingModel() {
  return new MockLanguageModelV2({
    modelId: "test-model",
    doStream: async () => ({
      stream: simulateReadableStream({
        chunks: [
          { type: "text-start", id: "text-1" },
          { type: "text-delta", id: "text-1", delta: "Hello" },
          { type: "text-delta", id: "text-1", delta: ", world!" },
          { type: "text-end", id: "text-1" },
          {
            type: "finish",
            finishReason: "stop",
            usage: { inputTokens: 3, outputTokens: 10, totalTokens: 13 },
          },
        ],
      }),
    }),
  });
}

describe("VercelChatModel", () => {
  it("answers a prompt with the generated text, usage and finish reason", async () => {
    const model = new VercelChatModel({ model: generatingModel("Hello, world!"), name: "mock" });

    const response = await model.call({
      messages: [
        { role: "system", content: "Be brief." },
        { role: "user", content: "Hi" },
      ],
      options: { temperature: 0 },
    });

    expect(response).toEqual({
      generations: [{ content: "Hello, world!", finishReason: "stop" }],
      metadata: {
        model: "test-model",
        usage: { inputTokens: 10, outputTokens: 20, totalTokens: 30 },
      },
    });
  });

  it("passes the messages to the language model in order", async () => {
    const languageModel = generatingModel("ok");
    const model = new VercelChatModel({ model: languageModel });

    await model.call({
      messages: [
        { role: "system", content: "Be brief." },
        { role: "user", content: "Hi" },
        { role: "assistant", content: "Hello" },
        { role: "user", content: "Bye" },
      ],
    });

    expect(languageModel.doGenerateCalls).toHaveLength(1);
    expect(languageModel.doGenerateCalls[0]?.prompt.map((message) => message.role)).toEqual([
      "system",
      "user",
      "assistant",
      "user",
    ]);
  });

  it("answers text with text", async () => {
    const model = new VercelChatModel({ model: generatingModel("Hello") });

    expect(await model.callText("Rewrite this")).toBe("Hello");
  });

  it("streams text deltas followed by a usage chunk", async () => {
    const model = new VercelChatModel({ model: streamingModel() });

    const chunks = await collectStream(model.stream({ messages: [{ role: "user", content: "Hi" }] }));

    expect(chunks.map(contentOf)).toEqual(["Hello", ", world!", ""]);
    expect(mergeChatResponses(chunks)).toEqual({
      generations: [{ content: "Hello, world!", finishReason: "stop" }],
      metadata: {
        model: "test-model",
        usage: { inputTokens: 3, outputTokens: 10, totalTokens: 13 },
      },
    });
  });

  it("tracks metrics for calls and streams", async () => {
    const model = new VercelChatModel({ model: streamingModel(), name: "mock" });

    await collectStream(model.stream({ messages: [{ role: "user", content: "Hi" }] }));

    expect(model.getMetrics()).toMatchObject({
      model: "mock",
      totalRequests: 1,
      successfulRequests: 1,
      failedRequests: 0,
      totalInputTokens: 3,
      totalOutputTokens: 10,
    });
  });

  it("reports a stream error to the injected logger and rethrows it", async () => {
    const logger = { ...createNoopLogger(), warn: vi.fn() };
    const model = new VercelChatModel({
      name: "mock",
      logger,
      model: new MockLanguageModelV2({
        modelId: "test-model",
        doStream: async () => ({
          stream: simulateReadableStream({
            chunks: [{ type: "error", error: new Error("overloaded") }],
          }),
        }),
      }),
    });

    await expect(
      collectStream(model.stream({ messages: [{ role: "user", content: "Hi" }] }))
    ).rejects.toThrow("overloaded");
    await vi.waitFor(() => {
      expect(logger.warn).toHaveBeenCalledWith("Model stream error", {
        model: "test-model",
        error: "overloaded",
      });
    });
    expect(model.getMetrics()).toMatchObject({ totalRequests: 1, failedRequests: 1 });
  });

  it("counts a failed call", async () => {
    const model = new VercelChatModel({
      model: new MockLanguageModelV2({
        doGenerate: async () => {
          throw new Error("boom");
        },
      }),
    });

    await expect(model.call({ messages: [{ role: "user", content: "Hi" }] })).rejects.toThrow(
      "boom"
    );
    expect(model.getMetrics()).toMatchObject({ totalRequests: 1, failedRequests: 1 });
  });

  it("names provider-backed models after their provider", () => {
    const model = new VercelChatModel({ provider: "openai", apiKey: "test-secret" });

    expect(model.name).toBe("vercel-openai");
  });
});
