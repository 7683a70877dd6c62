import type { ConversationMessage } from "./types";

/**
 * Conversation memory store.
 *
 * Messages are append-only per conversation and read back in write order.
 * An unknown conversation id reads as an empty history. `clear` is the only
 * operation that removes history.
 */
export interface ChatMemory {
  /**
   * Read the ordered history of a conversation.
   * When `lastN` is given only the most recent `lastN` messages are returned.
   */
  messagesFor(conversationId: string, lastN?: number): Promise<ConversationMessage[]>;

  /** Append messages, in order, to a conversation. */
  append(conversationId: string, messages: ConversationMessage[]): Promise<void>;

  /** Forget a conversation. Its id reads as an empty history afterwards. */
  clear(conversationId: string): Promise<void>;
}

export interface InMemoryChatMemoryConfig {
  /**
   * Oldest messages are evicted once a conversation grows past this size.
   * Setting it trades the append-only guarantee for bounded memory: a reader
   * then sees a suffix of what was written. Unset, the store is unbounded and
   * append-only.
   */
  maxMessagesPerConversation?: number;
}

export class InMemoryChatMemory implements ChatMemory {
  private readonly config: Required<InMemoryChatMemoryConfig>;
  private readonly conversations = new Map<string, ConversationMessage[]>();

  constructor(config: InMemoryChatMemoryConfig = {}) {
    this.config = {
      maxMessagesPerConversation: config.maxMessagesPerConversation ?? Number.POSITIVE_INFINITY,
    };
  }

  async messagesFor(conversationId: string, lastN?: number): Promise<ConversationMessage[]> {
    const messages = this.conversations.get(conversationId) ?? [];
    const window = lastN === undefined ? messages : messages.slice(Math.max(0, messages.length - lastN));
    return window.map((message) => ({ ...message }));
  }

  async append(conversationId: string, messages: ConversationMessage[]): Promise<void> {
    const existing = this.conversations.get(conversationId) ?? [];
    for (const message of messages) {
      existing.push({ role: message.role, content: message.content });
    }
    this.conversations.set(conversationId, existing);
    this.evictIfNeeded(existing);
  }

  async clear(conversationId: string): Promise<void> {
    this.conversations.delete(conversationId);
  }

  /** Ids of every conversation with at least one remembered message. */
  conversationIds(): string[] {
    return Array.from(this.conversations.keys());
  }

  private evictIfNeeded(messages: ConversationMessage[]): void {
    const overflow = messages.length - this.config.maxMessagesPerConversation;
    if (overflow > 0) {
      messages.splice(0, overflow);
    }
  }
}

export function createInMemoryChatMemory(config?: InMemoryChatMemoryConfig): InMemoryChatMemory {
  return new InMemoryChatMemory(config);
}
