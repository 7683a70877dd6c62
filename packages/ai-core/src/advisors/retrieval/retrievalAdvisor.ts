/**
 * Retrieval Advisor
 *
 * Grounds the request in retrieved documents:
 * 1. Optionally rewrite the user query with an auxiliary text-in/text-out
 *    model call, following a configurable requirement
 * 2. Search the retriever with the rewritten (or original) query
 * 3. Splice the documents into the system text; the user text stays verbatim
 *
 * Retrieval and query-rewrite failures abort the request leg, so the model is
 * never asked to answer from an empty context by accident.
 */

import type { DocumentRetriever, ScoredDocument, SearchOptions } from "@advisor-chain/memory";
import { z } from "zod";
import { CollaboratorError, ConfigurationError, errorMessage } from "../../errors";
import { type AdvisorLogger, createNoopLogger } from "../../logging";
import { annotateResponse } from "../../providers/responses";
import type { ChatModel, ChatResponse } from "../../providers/types";
import { type AdvisedRequest, withRequest } from "../advisedRequest";
import { type AdvisorContext, readParam } from "../advisorContext";
import { mapStream } from "../streams";
import {
  type Advisor,
  QUERY_REQUIREMENT_KEY,
  RETRIEVAL_FILTER_KEY,
  RETRIEVAL_TOP_K_KEY,
  RETRIEVED_DOCUMENTS_KEY,
  TRANSFORMED_QUERY_KEY,
} from "../types";

// ============================================================================
// Templates
// ============================================================================

const CONTEXT_BORDER = "---------------------";

export const DEFAULT_QUERY_REQUIREMENT = "no transformation needed";

export const GROUNDING_INSTRUCTION =
  "Answer the user's question using only the information in the CONTEXT section. " +
  "If the answer is not in the context, say that you can't answer the question.";

/**
 * Default grounding template: the original system text, the grounding
 * instruction, then a bordered CONTEXT section.
 */
export function renderGroundedSystemText(systemText: string, documents: string): string {
  const section = [CONTEXT_BORDER, "CONTEXT:", ...(documents ? [documents] : []), CONTEXT_BORDER];
  const parts = [GROUNDING_INSTRUCTION, section.join("\n")];
  if (systemText) {
    parts.unshift(systemText);
  }
  return `${parts.join("\n\n")}\n`;
}

/**
 * Default input for the query-rewrite call.
 */
export function renderQueryTransform(requirement: string, query: string): string {
  return [
    "Rewrite the query below so that it satisfies this requirement:",
    requirement,
    "Reply with the rewritten query only.",
    "",
    `Query: ${query}`,
  ].join("\n");
}

/**
 * Join document contents in ranking order.
 */
export function renderDocuments(documents: readonly ScoredDocument[]): string {
  return documents.map((document) => document.content).join("\n");
}

// ============================================================================
// Advisor
// ============================================================================

export interface RetrievalAdvisorConfig {
  /** Retrieval collaborator */
  retriever: DocumentRetriever;
  /**
   * Model used for query rewriting. Without one no rewrite happens, and
   * setting a query requirement (in config or per call) is a configuration error.
   */
  queryModel?: Pick<ChatModel, "callText">;
  /** Rewrite requirement when the call sets none (default: "no transformation needed") */
  queryRequirement?: string;
  /** Default search options */
  searchOptions?: SearchOptions;
  renderSystemText?: (systemText: string, documents: string) => string;
  renderQueryTransform?: (requirement: string, query: string) => string;
  /** Advisor name (default: "RetrievalAdvisor") */
  name?: string;
  logger?: AdvisorLogger;
}

const RequirementSchema = z.string();
const TopKSchema = z.number().int().positive();
const FilterSchema = z.record(z.string(), z.unknown());

export class RetrievalAdvisor implements Advisor {
  readonly name: string;

  private readonly retriever: DocumentRetriever;
  private readonly queryModel?: Pick<ChatModel, "callText">;
  /** Undefined when no query model is configured */
  private readonly queryRequirement?: string;
  private readonly searchOptions: SearchOptions;
  private readonly renderSystemText: (systemText: string, documents: string) => string;
  private readonly renderQueryTransform: (requirement: string, query: string) => string;
  private readonly logger: AdvisorLogger;

  constructor(config: RetrievalAdvisorConfig) {
    this.name = config.name ?? "RetrievalAdvisor";
    this.retriever = config.retriever;
    this.queryModel = config.queryModel;
    if (config.queryRequirement !== undefined && !config.queryModel) {
      throw new ConfigurationError(
        "MISSING_REQUIRED_PARAM",
        "A query requirement needs a query model to rewrite the query",
        { advisor: this.name, details: { key: "queryModel" } }
      );
    }
    this.queryRequirement = config.queryModel
      ? (config.queryRequirement ?? DEFAULT_QUERY_REQUIREMENT)
      : undefined;
    this.searchOptions = { ...config.searchOptions };
    this.renderSystemText = config.renderSystemText ?? renderGroundedSystemText;
    this.renderQueryTransform = config.renderQueryTransform ?? renderQueryTransform;
    this.logger = config.logger ?? createNoopLogger();
  }

  async adviseRequest(request: AdvisedRequest, context: AdvisorContext): Promise<AdvisedRequest> {
    if (!request.userText.trim()) {
      return request;
    }

    const searchOptions = this.resolveSearchOptions(context);
    const query = await this.transformQuery(request.userText, context);
    context.set(TRANSFORMED_QUERY_KEY, query);

    const documents = await this.retrieve(query, searchOptions);
    context.set(RETRIEVED_DOCUMENTS_KEY, documents);

    this.logger.debug("Retrieved documents", {
      advisor: this.name,
      query,
      documentCount: documents.length,
    });

    return withRequest(request, {
      systemText: this.renderSystemText(request.systemText, renderDocuments(documents)),
    });
  }

  adviseResponse(response: ChatResponse, context: AdvisorContext): ChatResponse {
    return this.annotate(response, context);
  }

  adviseStream(
    responses: AsyncIterable<ChatResponse>,
    context: AdvisorContext
  ): AsyncIterable<ChatResponse> {
    return mapStream(responses, (chunk) => this.annotate(chunk, context));
  }

  private annotate(response: ChatResponse, context: AdvisorContext): ChatResponse {
    const documents = context.get(RETRIEVED_DOCUMENTS_KEY);
    if (!Array.isArray(documents)) {
      return response;
    }
    return annotateResponse(response, { retrievedDocuments: documents });
  }

  private resolveSearchOptions(context: AdvisorContext): SearchOptions {
    return {
      ...this.searchOptions,
      topK: readParam(context, RETRIEVAL_TOP_K_KEY, TopKSchema, this.name) ?? this.searchOptions.topK,
      filter:
        readParam(context, RETRIEVAL_FILTER_KEY, FilterSchema, this.name) ??
        this.searchOptions.filter,
    };
  }

  private resolveRequirement(context: AdvisorContext): string | undefined {
    const requirement = readParam(context, QUERY_REQUIREMENT_KEY, RequirementSchema, this.name);
    if (requirement === undefined) {
      return this.queryRequirement;
    }
    if (!requirement.trim()) {
      throw new ConfigurationError(
        "MISSING_REQUIRED_PARAM",
        `Advisor parameter "${QUERY_REQUIREMENT_KEY}" is set but empty`,
        { advisor: this.name, details: { key: QUERY_REQUIREMENT_KEY } }
      );
    }
    if (!this.queryModel) {
      throw new ConfigurationError(
        "MISSING_REQUIRED_PARAM",
        `Advisor parameter "${QUERY_REQUIREMENT_KEY}" needs a query model to rewrite the query`,
        { advisor: this.name, details: { key: QUERY_REQUIREMENT_KEY } }
      );
    }
    return requirement;
  }

  private async transformQuery(query: string, context: AdvisorContext): Promise<string> {
    const requirement = this.resolveRequirement(context);
    if (!this.queryModel || requirement === undefined) {
      return query;
    }

    let rewritten: string;
    try {
      rewritten = await this.queryModel.callText(this.renderQueryTransform(requirement, query));
    } catch (error) {
      this.logger.error("Query transform failed", { advisor: this.name, error: errorMessage(error) });
      throw new CollaboratorError("QUERY_TRANSFORM_FAILED", "model", errorMessage(error), {
        cause: error,
        advisor: this.name,
      });
    }

    const trimmed = rewritten.trim();
    if (!trimmed) {
      this.logger.warn("Query transform returned no text; searching with the original query", {
        advisor: this.name,
      });
      return query;
    }
    return trimmed;
  }

  private async retrieve(query: string, options: SearchOptions): Promise<ScoredDocument[]> {
    try {
      return await this.retriever.search(query, options);
    } catch (error) {
      this.logger.error("Retrieval failed", { advisor: this.name, query, error: errorMessage(error) });
      throw new CollaboratorError("RETRIEVAL_FAILED", "retrieval", errorMessage(error), {
        cause: error,
        advisor: this.name,
        details: { query },
      });
    }
  }
}

export function createRetrievalAdvisor(config: RetrievalAdvisorConfig): RetrievalAdvisor {
  return new RetrievalAdvisor(config);
}
