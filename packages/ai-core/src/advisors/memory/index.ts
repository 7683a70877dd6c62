export {
  ChatMemoryAdvisor,
  type ChatMemoryAdvisorConfig,
  DEFAULT_CHAT_MEMORY_RETRIEVE_SIZE,
  DEFAULT_CONVERSATION_ID,
} from "./chatMemoryAdvisor";
export {
  createMessageChatMemoryAdvisor,
  MessageChatMemoryAdvisor,
} from "./messageChatMemoryAdvisor";
export {
  createPromptChatMemoryAdvisor,
  MEMORY_INSTRUCTION,
  PromptChatMemoryAdvisor,
  type PromptChatMemoryAdvisorConfig,
  renderMemoryBlock,
  renderMemorySystemText,
} from "./promptChatMemoryAdvisor";
