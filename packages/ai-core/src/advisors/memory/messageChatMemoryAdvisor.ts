import type { ConversationMessage } from "@advisor-chain/memory";
import { type AdvisedRequest, withRequest } from "../advisedRequest";
import { ChatMemoryAdvisor, type ChatMemoryAdvisorConfig } from "./chatMemoryAdvisor";

/**
 * Memory advisor that replays the conversation history as messages placed
 * ahead of the request's own messages.
 */
export class MessageChatMemoryAdvisor extends ChatMemoryAdvisor {
  constructor(config: ChatMemoryAdvisorConfig) {
    super(config, "MessageChatMemoryAdvisor");
  }

  protected augment(request: AdvisedRequest, history: ConversationMessage[]): AdvisedRequest {
    if (history.length === 0) {
      return request;
    }
    return withRequest(request, {
      messages: [...history, ...request.messages],
    });
  }
}

export function createMessageChatMemoryAdvisor(
  config: ChatMemoryAdvisorConfig
): MessageChatMemoryAdvisor {
  return new MessageChatMemoryAdvisor(config);
}
