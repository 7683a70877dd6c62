/**
 * Memory Types
 *
 * Shapes shared by the conversation memory and the document retrieval stores.
 */

// ============================================================================
// Conversation Memory
// ============================================================================

/** Role of a remembered message */
export type ConversationRole = "user" | "assistant" | "system";

/** A single remembered message, ordered by occurrence within its conversation */
export interface ConversationMessage {
  /** Message role */
  role: ConversationRole;
  /** Message content */
  content: string;
}

// ============================================================================
// Retrieval
// ============================================================================

/**
 * A retrievable document.
 */
export interface Document {
  /** Document identifier */
  id: string;
  /** Text content */
  content: string;
  /** Arbitrary metadata, matched by search filters */
  metadata: Record<string, unknown>;
  /** Precomputed embedding (optional) */
  embedding?: number[];
}

/**
 * A document returned by a search, with its relevance score.
 */
export interface ScoredDocument extends Document {
  /** Relevance score (higher is more relevant) */
  score: number;
}

/**
 * Options for a document search.
 */
export interface SearchOptions {
  /** Maximum number of documents to return (default: 4) */
  topK?: number;
  /** Minimum score a document needs to be returned (default: 0) */
  similarityThreshold?: number;
  /** Metadata equality filter; every entry must match */
  filter?: Record<string, unknown>;
}
