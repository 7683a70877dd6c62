/**
 * Advisor Types
 *
 * An advisor intercepts one invocation of the chat model. It may implement
 * any subset of three legs; a missing leg passes its input through.
 */

import type { ChatResponse } from "../providers/types";
import type { AdvisedRequest } from "./advisedRequest";
import type { AdvisorContext } from "./advisorContext";

// ============================================================================
// Advisor Contract
// ============================================================================

export interface Advisor {
  /** Advisor name, used in logs, warnings and errors */
  readonly name: string;

  /**
   * Rewrite the outgoing request. Runs before the model is invoked.
   */
  adviseRequest?(
    request: AdvisedRequest,
    context: AdvisorContext
  ): AdvisedRequest | Promise<AdvisedRequest>;

  /**
   * Rewrite a complete response. Runs once after a synchronous model call.
   */
  adviseResponse?(
    response: ChatResponse,
    context: AdvisorContext
  ): ChatResponse | Promise<ChatResponse>;

  /**
   * Decorate a streamed response. Called once per stream, before the first
   * element is pulled; must not pull elements itself.
   */
  adviseStream?(
    responses: AsyncIterable<ChatResponse>,
    context: AdvisorContext
  ): AsyncIterable<ChatResponse>;
}

/** Leg of the chain an advisor ran on */
export type AdvisorLeg = "request" | "response" | "stream";

// ============================================================================
// Well-known Parameter Keys
// ============================================================================

/** Conversation id used by the memory advisors */
export const CHAT_MEMORY_CONVERSATION_ID_KEY = "chat_memory_conversation_id";

/** How many of the most recent messages the memory advisors read */
export const CHAT_MEMORY_RETRIEVE_SIZE_KEY = "chat_memory_response_size";

/** Instruction for rewriting the retrieval query */
export const QUERY_REQUIREMENT_KEY = "query_requirement";

/** Number of documents to retrieve */
export const RETRIEVAL_TOP_K_KEY = "retrieval_top_k";

/** Metadata equality filter applied to retrieval */
export const RETRIEVAL_FILTER_KEY = "retrieval_filter";

// ============================================================================
// Well-known Context Keys
// ============================================================================

/** Documents the retrieval advisor grounded the request in */
export const RETRIEVED_DOCUMENTS_KEY = "qa_retrieved_documents";

/** Query the retrieval advisor searched with */
export const TRANSFORMED_QUERY_KEY = "qa_transformed_query";
