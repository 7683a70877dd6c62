import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ScriptedChatModel } from "../testing";
import type { Prompt } from "./types";

const PROMPT: Prompt = { messages: [{ role: "user", content: "Hi" }] };

describe("BaseChatModel retries", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("retries a failed call after a backoff delay", async () => {
    const model = new ScriptedChatModel({
      replies: ["ok"],
      failFirst: [new Error("overloaded")],
      maxRetries: 1,
    });

    const result = model.callText("Hi");
    await vi.advanceTimersByTimeAsync(1000);

    await expect(result).resolves.toBe("ok");
    expect(model.prompts).toHaveLength(2);
    expect(model.getMetrics()).toMatchObject({
      totalRequests: 1,
      successfulRequests: 1,
      failedRequests: 0,
    });
  });

  it("does not retry an authorization failure", async () => {
    const unauthorized = new Error("401 Unauthorized");
    const model = new ScriptedChatModel({ replies: ["ok"], failFirst: [unauthorized], maxRetries: 3 });

    await expect(model.call(PROMPT)).rejects.toBe(unauthorized);
    expect(model.prompts).toHaveLength(1);
    expect(model.getMetrics().failedRequests).toBe(1);
  });

  it("rejects with the last error once retries are exhausted", async () => {
    const overloaded = new Error("overloaded");
    const model = new ScriptedChatModel({ callError: overloaded, maxRetries: 2 });

    const assertion = expect(model.call(PROMPT)).rejects.toBe(overloaded);
    await vi.advanceTimersByTimeAsync(1000 + 2000);

    await assertion;
    expect(model.prompts).toHaveLength(3);
  });

  it("caps the backoff delay", async () => {
    const model = new ScriptedChatModel({
      replies: ["ok"],
      failFirst: [new Error("overloaded"), new Error("overloaded")],
      maxRetries: 2,
      maxRetryDelayMs: 500,
    });

    const result = model.callText("Hi");
    await vi.advanceTimersByTimeAsync(500 + 500);

    await expect(result).resolves.toBe("ok");
    expect(model.prompts).toHaveLength(3);
  });

  it("does not retry by default", async () => {
    const model = new ScriptedChatModel({ replies: ["ok"], failFirst: [new Error("overloaded")] });

    await expect(model.callText("Hi")).rejects.toThrow("overloaded");
    expect(model.prompts).toHaveLength(1);
  });
});
