import { describe, expect, it, vi } from "vitest";
import { annotateResponse, contentOf, createChatResponse } from "../providers/responses";
import type { ChatResponse } from "../providers/types";
import { type AdvisedRequest, createAdvisedRequest, withRequest } from "./advisedRequest";
import {
  AdvisorChain,
  createSimpleAdvisor,
  runRequestChain,
  runResponseChain,
  runStreamingResponseChain,
} from "./advisorChain";
import { createAdvisorContext } from "./advisorContext";
import { collectStream, mapStream } from "./streams";
import type { Advisor } from "./types";

function appender(name: string): Advisor {
  return createSimpleAdvisor(name, {
    adviseRequest: (request) => withRequest(request, { systemText: request.systemText + name }),
    adviseResponse: (response) => createChatResponse(contentOf(response) + name),
    adviseStream: (responses) =>
      mapStream(responses, (chunk) => createChatResponse(contentOf(chunk) + name)),
  });
}

function recordingLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

async function* chunks(texts: string[], pulled: string[] = []): AsyncGenerator<ChatResponse> {
  for (const text of texts) {
    pulled.push(text);
    yield createChatResponse(text);
  }
}

describe("runRequestChain", () => {
  it("folds advisors left to right in registration order", async () => {
    const initial = createAdvisedRequest({ systemText: ">" });

    const ab = await runRequestChain(initial, [appender("A"), appender("B")], createAdvisorContext());
    const ba = await runRequestChain(initial, [appender("B"), appender("A")], createAdvisorContext());

    expect(ab.systemText).toBe(">AB");
    expect(ba.systemText).toBe(">BA");
  });

  it("skips advisors without a request leg", async () => {
    const responseOnly = createSimpleAdvisor("responseOnly", {
      adviseResponse: (response) => response,
    });

    const result = await runRequestChain(
      createAdvisedRequest({ systemText: ">" }),
      [responseOnly, appender("A")],
      createAdvisorContext()
    );

    expect(result.systemText).toBe(">A");
  });

  it("awaits asynchronous advisors", async () => {
    const slow = createSimpleAdvisor("slow", {
      adviseRequest: async (request) => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        return withRequest(request, { userText: "slow" });
      },
    });

    const result = await runRequestChain(
      createAdvisedRequest(),
      [slow, appender("A")],
      createAdvisorContext()
    );

    expect(result.userText).toBe("slow");
    expect(result.systemText).toBe("A");
  });

  it("logs each execution at debug level", async () => {
    const logger = recordingLogger();

    await runRequestChain(createAdvisedRequest(), [appender("A")], createAdvisorContext(), logger);

    expect(logger.debug).toHaveBeenCalledWith("Advisor executed", {
      advisor: "A",
      leg: "request",
      durationMs: expect.any(Number),
    });
  });

  it("propagates an advisor failure and runs no later advisor", async () => {
    const logger = recordingLogger();
    const later = vi.fn((request: AdvisedRequest) => request);
    const broken = createSimpleAdvisor("broken", {
      adviseRequest: () => {
        throw new Error("advisor broke");
      },
    });

    await expect(
      runRequestChain(
        createAdvisedRequest(),
        [broken, createSimpleAdvisor("later", { adviseRequest: later })],
        createAdvisorContext(),
        logger
      )
    ).rejects.toThrow("advisor broke");
    expect(later).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledWith("Advisor failed", {
      advisor: "broken",
      leg: "request",
      error: "advisor broke",
    });
  });
});

describe("runResponseChain", () => {
  it("folds advisors in registration order", async () => {
    const result = await runResponseChain(
      createChatResponse("<"),
      [appender("A"), appender("B")],
      createAdvisorContext()
    );

    expect(contentOf(result)).toBe("<AB");
  });

  it("sees context values written on the request leg", async () => {
    const context = createAdvisorContext();
    const writer = createSimpleAdvisor("writer", {
      adviseRequest: (request, ctx) => {
        ctx.set("writer.marker", "from request leg");
        return request;
      },
    });
    const reader = createSimpleAdvisor("reader", {
      adviseResponse: (response, ctx) =>
        annotateResponse(response, { marker: ctx.get("writer.marker") }),
    });

    await runRequestChain(createAdvisedRequest(), [writer, reader], context);
    const response = await runResponseChain(createChatResponse("ok"), [writer, reader], context);

    expect(response.metadata.annotations).toEqual({ marker: "from request leg" });
  });
});

describe("runStreamingResponseChain", () => {
  it("decorates the sequence in registration order", async () => {
    const stream = runStreamingResponseChain(
      chunks(["x", "y"]),
      [appender("A"), appender("B")],
      createAdvisorContext()
    );

    const texts = (await collectStream(stream)).map(contentOf);

    expect(texts).toEqual(["xAB", "yAB"]);
  });

  it("calls each stream leg once and pulls nothing before iteration", () => {
    const pulled: string[] = [];
    const adviseStream = vi.fn((responses: AsyncIterable<ChatResponse>) => responses);

    runStreamingResponseChain(
      chunks(["x", "y"], pulled),
      [createSimpleAdvisor("observer", { adviseStream })],
      createAdvisorContext()
    );

    expect(adviseStream).toHaveBeenCalledTimes(1);
    expect(pulled).toEqual([]);
  });

  it("can be drained only once", async () => {
    const stream = runStreamingResponseChain(chunks(["x"]), [appender("A")], createAdvisorContext());

    expect((await collectStream(stream)).map(contentOf)).toEqual(["xA"]);
    expect(await collectStream(stream)).toEqual([]);
  });
});

describe("AdvisorChain", () => {
  it("extends into a new chain without touching the original", async () => {
    const base = new AdvisorChain({ advisors: [appender("A")] });
    const extended = base.extend([appender("B")]);

    const request = await extended.adviseRequest(
      createAdvisedRequest({ systemText: ">" }),
      createAdvisorContext()
    );

    expect(request.systemText).toBe(">AB");
    expect(base.getAdvisors()).toHaveLength(1);
  });

  it("returns itself when extended with nothing", () => {
    const base = new AdvisorChain({ advisors: [appender("A")] });

    expect(base.extend([])).toBe(base);
  });
});
