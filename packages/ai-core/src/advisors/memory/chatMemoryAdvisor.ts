/**
 * Chat Memory Advisor Base
 *
 * Shared request/response legs for the memory advisors:
 * - Request leg: resolve the conversation id, read the recent history,
 *   hand it to the subclass to splice into the request
 * - Response leg: once the full answer is known, append the user turn and
 *   the assistant turn, in that order
 *
 * A failed read degrades to an empty history. A failed write is reported as a
 * warning on the invocation context and never retracts the response.
 */

import type { ChatMemory, ConversationMessage } from "@advisor-chain/memory";
import { z } from "zod";
import { errorMessage } from "../../errors";
import { type AdvisorLogger, createNoopLogger } from "../../logging";
import { contentOf } from "../../providers/responses";
import type { ChatResponse } from "../../providers/types";
import type { AdvisedRequest } from "../advisedRequest";
import { type AdvisorContext, readParam } from "../advisorContext";
import { tapStream } from "../streams";
import {
  type Advisor,
  CHAT_MEMORY_CONVERSATION_ID_KEY,
  CHAT_MEMORY_RETRIEVE_SIZE_KEY,
} from "../types";

export const DEFAULT_CONVERSATION_ID = "default";
export const DEFAULT_CHAT_MEMORY_RETRIEVE_SIZE = 100;

export interface ChatMemoryAdvisorConfig {
  /** Memory collaborator */
  chatMemory: ChatMemory;
  /** Conversation id used when neither the context nor the request names one */
  defaultConversationId?: string;
  /** Number of most recent messages to read (default: 100) */
  defaultRetrieveSize?: number;
  /** Advisor name (default: the class's own) */
  name?: string;
  logger?: AdvisorLogger;
}

const ConversationIdSchema = z.string().min(1, "conversation id must not be empty");
const RetrieveSizeSchema = z.number().int().positive();
const PendingTurnSchema = z.object({
  conversationId: z.string(),
  userText: z.string(),
});

let advisorSequence = 0;

export abstract class ChatMemoryAdvisor implements Advisor {
  readonly name: string;

  protected readonly chatMemory: ChatMemory;
  protected readonly logger: AdvisorLogger;
  private readonly defaultConversationId: string;
  private readonly defaultRetrieveSize: number;
  /** Context key carrying the user turn from the request leg to the response leg */
  private readonly pendingTurnKey: string;

  constructor(config: ChatMemoryAdvisorConfig, defaultName: string) {
    this.name = config.name ?? defaultName;
    this.chatMemory = config.chatMemory;
    this.logger = config.logger ?? createNoopLogger();
    this.defaultConversationId = config.defaultConversationId ?? DEFAULT_CONVERSATION_ID;
    this.defaultRetrieveSize = config.defaultRetrieveSize ?? DEFAULT_CHAT_MEMORY_RETRIEVE_SIZE;
    advisorSequence += 1;
    this.pendingTurnKey = `${this.name}#${advisorSequence}.pending_turn`;
  }

  /**
   * Splice the conversation history into the request.
   */
  protected abstract augment(
    request: AdvisedRequest,
    history: ConversationMessage[]
  ): AdvisedRequest;

  async adviseRequest(request: AdvisedRequest, context: AdvisorContext): Promise<AdvisedRequest> {
    const conversationId = this.resolveConversationId(request, context);
    const retrieveSize =
      readParam(context, CHAT_MEMORY_RETRIEVE_SIZE_KEY, RetrieveSizeSchema, this.name) ??
      this.defaultRetrieveSize;

    const history = await this.readHistory(conversationId, retrieveSize, context);
    context.set(this.pendingTurnKey, { conversationId, userText: request.userText });

    return this.augment(request, history);
  }

  async adviseResponse(response: ChatResponse, context: AdvisorContext): Promise<ChatResponse> {
    await this.remember(context, contentOf(response));
    return response;
  }

  adviseStream(
    responses: AsyncIterable<ChatResponse>,
    context: AdvisorContext
  ): AsyncIterable<ChatResponse> {
    let answer = "";
    return tapStream(responses, {
      onItem: (chunk) => {
        answer += contentOf(chunk);
      },
      onComplete: () => this.remember(context, answer),
    });
  }

  protected resolveConversationId(request: AdvisedRequest, context: AdvisorContext): string {
    return (
      readParam(context, CHAT_MEMORY_CONVERSATION_ID_KEY, ConversationIdSchema, this.name) ??
      request.conversationId ??
      this.defaultConversationId
    );
  }

  private async readHistory(
    conversationId: string,
    retrieveSize: number,
    context: AdvisorContext
  ): Promise<ConversationMessage[]> {
    try {
      return await this.chatMemory.messagesFor(conversationId, retrieveSize);
    } catch (error) {
      this.logger.warn("Chat memory read failed; continuing without history", {
        advisor: this.name,
        conversationId,
        error: errorMessage(error),
      });
      context.report({
        advisor: this.name,
        code: "MEMORY_READ_FAILED",
        message: errorMessage(error),
        cause: error,
      });
      return [];
    }
  }

  private async remember(context: AdvisorContext, answer: string): Promise<void> {
    const pending = PendingTurnSchema.safeParse(context.get(this.pendingTurnKey));
    if (!pending.success) {
      return;
    }
    context.delete(this.pendingTurnKey);

    const { conversationId, userText } = pending.data;
    const turn: ConversationMessage[] = [];
    if (userText) {
      turn.push({ role: "user", content: userText });
    }
    turn.push({ role: "assistant", content: answer });

    try {
      await this.chatMemory.append(conversationId, turn);
    } catch (error) {
      this.logger.warn("Chat memory write failed", {
        advisor: this.name,
        conversationId,
        error: errorMessage(error),
      });
      context.report({
        advisor: this.name,
        code: "MEMORY_WRITE_FAILED",
        message: errorMessage(error),
        cause: error,
      });
    }
  }
}
