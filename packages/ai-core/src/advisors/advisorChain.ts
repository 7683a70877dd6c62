/**
 * Advisor Chain
 *
 * Runs advisors around one model invocation, strictly in registration order:
 * - Request leg: left fold of `adviseRequest` over the advised request
 * - Response leg: left fold of `adviseResponse` over the model response
 * - Stream leg: each `adviseStream` decorates the previous advisor's sequence
 *
 * Errors raised by an advisor are logged and propagated; the chain never
 * skips a failing advisor.
 */

import { createNoopLogger, type AdvisorLogger } from "../logging";
import type { ChatResponse } from "../providers/types";
import type { AdvisedRequest } from "./advisedRequest";
import type { AdvisorContext } from "./advisorContext";
import { singleUse } from "./streams";
import type { Advisor, AdvisorLeg } from "./types";

// ============================================================================
// Chain Executors
// ============================================================================

/**
 * Fold the request leg of `advisors` over `initial`.
 */
export async function runRequestChain(
  initial: AdvisedRequest,
  advisors: readonly Advisor[],
  context: AdvisorContext,
  logger: AdvisorLogger = createNoopLogger()
): Promise<AdvisedRequest> {
  let request = initial;
  for (const advisor of advisors) {
    if (!advisor.adviseRequest) {
      continue;
    }
    const adviseRequest = advisor.adviseRequest.bind(advisor);
    const current = request;
    request = await runLeg(advisor, "request", logger, () => adviseRequest(current, context));
  }
  return request;
}

/**
 * Fold the response leg of `advisors` over `initial`.
 */
export async function runResponseChain(
  initial: ChatResponse,
  advisors: readonly Advisor[],
  context: AdvisorContext,
  logger: AdvisorLogger = createNoopLogger()
): Promise<ChatResponse> {
  let response = initial;
  for (const advisor of advisors) {
    if (!advisor.adviseResponse) {
      continue;
    }
    const adviseResponse = advisor.adviseResponse.bind(advisor);
    const current = response;
    response = await runLeg(advisor, "response", logger, () => adviseResponse(current, context));
  }
  return response;
}

/**
 * Decorate `source` with the stream leg of `advisors`.
 * No element is pulled here; the returned sequence can be drained once.
 */
export function runStreamingResponseChain(
  source: AsyncIterable<ChatResponse>,
  advisors: readonly Advisor[],
  context: AdvisorContext,
  logger: AdvisorLogger = createNoopLogger()
): AsyncGenerator<ChatResponse, void, undefined> {
  let stream = source;
  for (const advisor of advisors) {
    if (!advisor.adviseStream) {
      continue;
    }
    try {
      stream = advisor.adviseStream(stream, context);
    } catch (error) {
      logFailure(logger, advisor, "stream", error);
      throw error;
    }
    logger.debug("Advisor decorated stream", { advisor: advisor.name, leg: "stream" });
  }
  return singleUse(stream);
}

async function runLeg<T>(
  advisor: Advisor,
  leg: AdvisorLeg,
  logger: AdvisorLogger,
  run: () => T | Promise<T>
): Promise<T> {
  const startTime = Date.now();
  try {
    const result = await run();
    logger.debug("Advisor executed", {
      advisor: advisor.name,
      leg,
      durationMs: Date.now() - startTime,
    });
    return result;
  } catch (error) {
    logFailure(logger, advisor, leg, error);
    throw error;
  }
}

function logFailure(logger: AdvisorLogger, advisor: Advisor, leg: AdvisorLeg, error: unknown): void {
  logger.error("Advisor failed", {
    advisor: advisor.name,
    leg,
    error: error instanceof Error ? error.message : String(error),
  });
}

// ============================================================================
// Advisor Chain
// ============================================================================

export interface AdvisorChainConfig {
  /** Advisors in execution order */
  advisors?: readonly Advisor[];
  logger?: AdvisorLogger;
}

/**
 * Immutable, ordered advisor list bound to a logger. A client keeps its
 * default advisors in one and extends it with each call's own advisors.
 */
export class AdvisorChain {
  private readonly advisors: readonly Advisor[];
  private readonly logger: AdvisorLogger;

  constructor(config: AdvisorChainConfig = {}) {
    this.advisors = [...(config.advisors ?? [])];
    this.logger = config.logger ?? createNoopLogger();
  }

  getAdvisors(): Advisor[] {
    return [...this.advisors];
  }

  /**
   * A new chain running this chain's advisors followed by `advisors`.
   */
  extend(advisors: readonly Advisor[]): AdvisorChain {
    if (advisors.length === 0) {
      return this;
    }
    return new AdvisorChain({ advisors: [...this.advisors, ...advisors], logger: this.logger });
  }

  adviseRequest(request: AdvisedRequest, context: AdvisorContext): Promise<AdvisedRequest> {
    return runRequestChain(request, this.advisors, context, this.logger);
  }

  adviseResponse(response: ChatResponse, context: AdvisorContext): Promise<ChatResponse> {
    return runResponseChain(response, this.advisors, context, this.logger);
  }

  adviseStream(
    responses: AsyncIterable<ChatResponse>,
    context: AdvisorContext
  ): AsyncGenerator<ChatResponse, void, undefined> {
    return runStreamingResponseChain(responses, this.advisors, context, this.logger);
  }
}

/**
 * Create an advisor from plain functions.
 */
export function createSimpleAdvisor(
  name: string,
  legs: Omit<Advisor, "name">
): Advisor {
  return { name, ...legs };
}
