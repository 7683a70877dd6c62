/**
 * Advised Request
 *
 * Immutable snapshot of an outgoing request as the request-advisor chain
 * sees it. Advisors never mutate a snapshot; they return a new one through
 * `withRequest`.
 */

import type { ChatOptions, Message, Prompt } from "../providers/types";

export interface AdvisedRequest {
  /** System text sent ahead of the conversation */
  readonly systemText: string;
  /** The end user's message, kept verbatim */
  readonly userText: string;
  /** Prior conversation turns placed between the system and user messages */
  readonly messages: readonly Readonly<Message>[];
  /** Conversation identifier, when the caller set one on the prompt */
  readonly conversationId?: string;
  /**
   * Caller-supplied advisor parameters. Keys advisors write into the
   * invocation context never appear here.
   */
  readonly advisorParams: Readonly<Record<string, unknown>>;
  /** Model options */
  readonly chatOptions: Readonly<ChatOptions>;
}

export interface AdvisedRequestInit {
  systemText?: string;
  userText?: string;
  messages?: readonly Message[];
  conversationId?: string;
  advisorParams?: Record<string, unknown>;
  chatOptions?: ChatOptions;
}

export type AdvisedRequestPatch = Partial<Omit<AdvisedRequest, "advisorParams">>;

export function createAdvisedRequest(init: AdvisedRequestInit = {}): AdvisedRequest {
  const request: AdvisedRequest = {
    systemText: init.systemText ?? "",
    userText: init.userText ?? "",
    messages: Object.freeze(
      (init.messages ?? []).map((message) =>
        Object.freeze({ role: message.role, content: message.content })
      )
    ),
    advisorParams: Object.freeze({ ...init.advisorParams }),
    chatOptions: freezeOptions(init.chatOptions ?? {}),
  };
  if (init.conversationId !== undefined) {
    return Object.freeze({ ...request, conversationId: init.conversationId });
  }
  return Object.freeze(request);
}

/**
 * Copy a snapshot with some fields replaced.
 * Advisor parameters always carry over from the source snapshot.
 */
export function withRequest(request: AdvisedRequest, patch: AdvisedRequestPatch): AdvisedRequest {
  return createAdvisedRequest({
    systemText: patch.systemText ?? request.systemText,
    userText: patch.userText ?? request.userText,
    messages: patch.messages ?? request.messages,
    conversationId: patch.conversationId ?? request.conversationId,
    advisorParams: request.advisorParams,
    chatOptions: patch.chatOptions ?? request.chatOptions,
  });
}

/**
 * Render the model prompt: system message, prior turns, then the user message.
 * Empty system or user text produces no message.
 */
export function toPrompt(request: AdvisedRequest): Prompt {
  const messages: Message[] = [];
  if (request.systemText) {
    messages.push({ role: "system", content: request.systemText });
  }
  for (const message of request.messages) {
    messages.push({ role: message.role, content: message.content });
  }
  if (request.userText) {
    messages.push({ role: "user", content: request.userText });
  }

  const options = { ...request.chatOptions };
  if (options.stopSequences) {
    options.stopSequences = [...options.stopSequences];
  }
  return { messages, options };
}

function freezeOptions(options: ChatOptions): Readonly<ChatOptions> {
  const copy: ChatOptions = { ...options };
  if (copy.stopSequences) {
    copy.stopSequences = [...copy.stopSequences];
    Object.freeze(copy.stopSequences);
  }
  return Object.freeze(copy);
}
