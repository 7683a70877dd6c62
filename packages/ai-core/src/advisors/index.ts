/**
 * Advisors
 *
 * Interceptors around one chat model invocation, the per-invocation context
 * they share, and the chain executor that runs them in registration order.
 *
 * @example
 * ```typescript
 * import { createAdvisedRequest, createAdvisorContext, runRequestChain } from '@advisor-chain/ai-core';
 *
 * const context = createAdvisorContext({ chat_memory_conversation_id: 'c-1' });
 * const request = await runRequestChain(
 *   createAdvisedRequest({ systemText: 'Be brief.', userText: 'Hi' }),
 *   [memoryAdvisor, retrievalAdvisor],
 *   context
 * );
 * ```
 */

// Types
export {
  type Advisor,
  type AdvisorLeg,
  CHAT_MEMORY_CONVERSATION_ID_KEY,
  CHAT_MEMORY_RETRIEVE_SIZE_KEY,
  QUERY_REQUIREMENT_KEY,
  RETRIEVAL_FILTER_KEY,
  RETRIEVAL_TOP_K_KEY,
  RETRIEVED_DOCUMENTS_KEY,
  TRANSFORMED_QUERY_KEY,
} from "./types";

// Advised request & context
export {
  type AdvisedRequest,
  type AdvisedRequestInit,
  type AdvisedRequestPatch,
  createAdvisedRequest,
  toPrompt,
  withRequest,
} from "./advisedRequest";
export { AdvisorContext, createAdvisorContext, readParam } from "./advisorContext";

// Chain
export {
  AdvisorChain,
  type AdvisorChainConfig,
  createSimpleAdvisor,
  runRequestChain,
  runResponseChain,
  runStreamingResponseChain,
} from "./advisorChain";
export { collectStream, mapStream, singleUse, type StreamHooks, tapStream } from "./streams";

// Advisors
export * from "./memory";
export * from "./retrieval";
export {
  createLoggingAdvisor,
  LoggingAdvisor,
  type LoggingAdvisorConfig,
} from "./logging/loggingAdvisor";
