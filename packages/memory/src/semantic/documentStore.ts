import type { Document, ScoredDocument, SearchOptions } from "../types";

/**
 * Retrieval collaborator: ranked document search.
 */
export interface DocumentRetriever {
  /** Search for documents relevant to `query`, most relevant first. */
  search(query: string, options?: SearchOptions): Promise<ScoredDocument[]>;
}

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
  dimension: number;
}

export interface InMemoryDocumentStoreConfig {
  /** Embeds documents and queries; keyword scoring is used when absent */
  embeddingProvider?: EmbeddingProvider;
  /** Default result count (default: 4) */
  defaultTopK?: number;
}

export const DEFAULT_TOP_K = 4;

export class InMemoryDocumentStore implements DocumentRetriever {
  private readonly documents = new Map<string, Document>();
  private readonly embeddingProvider?: EmbeddingProvider;
  private readonly defaultTopK: number;

  constructor(config: InMemoryDocumentStoreConfig = {}) {
    this.embeddingProvider = config.embeddingProvider;
    this.defaultTopK = config.defaultTopK ?? DEFAULT_TOP_K;
  }

  async add(documents: Document[]): Promise<void> {
    for (const document of documents) {
      const embedding = document.embedding ?? (await this.embedIfNeeded(document.content));
      if (embedding && this.embeddingProvider && embedding.length !== this.embeddingProvider.dimension) {
        throw new Error(
          `Embedding for document ${document.id} has dimension ${embedding.length}, expected ${this.embeddingProvider.dimension}`
        );
      }
      this.documents.set(document.id, { ...document, embedding });
    }
  }

  async delete(id: string): Promise<void> {
    this.documents.delete(id);
  }

  size(): number {
    return this.documents.size;
  }

  async search(query: string, options: SearchOptions = {}): Promise<ScoredDocument[]> {
    const normalized = query.trim().toLowerCase();
    if (!normalized) {
      return [];
    }

    const topK = options.topK ?? this.defaultTopK;
    const threshold = options.similarityThreshold ?? 0;
    const candidates = Array.from(this.documents.values()).filter((document) =>
      matchesFilter(document, options.filter)
    );

    const queryEmbedding = await this.embedIfNeeded(query);
    const scored: ScoredDocument[] = [];
    for (const document of candidates) {
      if (queryEmbedding && document.embedding) {
        const score = cosineSimilarity(queryEmbedding, document.embedding);
        if (score >= threshold) {
          scored.push({ ...document, score });
        }
        continue;
      }
      const score = textScore(document.content, normalized);
      if (score > 0 && score >= threshold) {
        scored.push({ ...document, score });
      }
    }

    // Array#sort is stable, so equal scores keep insertion order
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, topK);
  }

  private async embedIfNeeded(text: string): Promise<number[] | undefined> {
    if (!this.embeddingProvider) {
      return undefined;
    }
    return this.embeddingProvider.embed(text);
  }
}

export function createInMemoryDocumentStore(
  config?: InMemoryDocumentStoreConfig
): InMemoryDocumentStore {
  return new InMemoryDocumentStore(config);
}

function matchesFilter(document: Document, filter?: Record<string, unknown>): boolean {
  if (!filter) {
    return true;
  }
  return Object.entries(filter).every(([key, value]) => document.metadata[key] === value);
}

function tokenize(text: string): string[] {
  return text.split(/[^\p{L}\p{N}]+/u).filter((token) => token.length > 0);
}

function textScore(content: string, query: string): number {
  const normalized = content.toLowerCase();
  if (normalized === query) {
    return 1;
  }
  if (normalized.includes(query)) {
    return Math.min(0.9, query.length / normalized.length + 0.3);
  }

  const terms = tokenize(query);
  if (terms.length === 0) {
    return 0;
  }
  const contentTerms = new Set(tokenize(normalized));
  const matched = terms.filter((term) => contentTerms.has(term)).length;
  return (matched / terms.length) * 0.5;
}

function cosineSimilarity(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
