import type { ConversationMessage } from "@advisor-chain/memory";
import { type AdvisedRequest, withRequest } from "../advisedRequest";
import { ChatMemoryAdvisor, type ChatMemoryAdvisorConfig } from "./chatMemoryAdvisor";

const MEMORY_BORDER = "---------------------";

export const MEMORY_INSTRUCTION =
  "Use the conversation memory from the MEMORY section to provide accurate answers.";

export interface PromptChatMemoryAdvisorConfig extends ChatMemoryAdvisorConfig {
  /** Build the system text from the original system text and the rendered memory block */
  renderSystemText?: (systemText: string, memory: string) => string;
}

/**
 * Render history one entry per line as `ROLE:content`, in order.
 * An empty history renders as "".
 */
export function renderMemoryBlock(history: readonly ConversationMessage[]): string {
  return history.map((message) => `${message.role.toUpperCase()}:${message.content}`).join("\n");
}

/**
 * Default memory template: the original system text, the memory instruction,
 * then a bordered MEMORY section.
 */
export function renderMemorySystemText(systemText: string, memory: string): string {
  const section = [MEMORY_BORDER, "MEMORY:", ...(memory ? [memory] : []), MEMORY_BORDER];
  const parts = [MEMORY_INSTRUCTION, section.join("\n")];
  if (systemText) {
    parts.unshift(systemText);
  }
  return `${parts.join("\n\n")}\n`;
}

/**
 * Memory advisor that renders the conversation history into the system text.
 * The user text is left unchanged.
 */
export class PromptChatMemoryAdvisor extends ChatMemoryAdvisor {
  private readonly renderSystemText: (systemText: string, memory: string) => string;

  constructor(config: PromptChatMemoryAdvisorConfig) {
    super(config, "PromptChatMemoryAdvisor");
    this.renderSystemText = config.renderSystemText ?? renderMemorySystemText;
  }

  protected augment(request: AdvisedRequest, history: ConversationMessage[]): AdvisedRequest {
    return withRequest(request, {
      systemText: this.renderSystemText(request.systemText, renderMemoryBlock(history)),
    });
  }
}

export function createPromptChatMemoryAdvisor(
  config: PromptChatMemoryAdvisorConfig
): PromptChatMemoryAdvisor {
  return new PromptChatMemoryAdvisor(config);
}
