/**
 * @advisor-chain/memory
 *
 * Collaborator stores consumed by the advisor chain:
 * - Conversation memory (append-only, ordered per conversation id)
 * - Document retrieval (ranked search with keyword or embedding scoring)
 */

export type {
  ConversationMessage,
  ConversationRole,
  Document,
  ScoredDocument,
  SearchOptions,
} from "./types";

export {
  type ChatMemory,
  createInMemoryChatMemory,
  InMemoryChatMemory,
  type InMemoryChatMemoryConfig,
} from "./chatMemory";

export {
  createInMemoryDocumentStore,
  DEFAULT_TOP_K,
  type DocumentRetriever,
  type EmbeddingProvider,
  InMemoryDocumentStore,
  type InMemoryDocumentStoreConfig,
} from "./semantic/documentStore";
