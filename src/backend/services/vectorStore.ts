/**
 * Vector Store Service
 *
 * In-memory vector store holding one source's pre-built index.
 *
 * HOW IT WORKS:
 * 1. Entries (text + embedding) are loaded once from the serialized index
 * 2. The query is converted to an embedding vector by the caller
 * 3. Every entry is scored against the query with cosine similarity
 * 4. The best `limit` entries come back, most similar first
 *
 * Search is exact and brute-force.
 */

import { SnippetMetadata } from '../../shared/types';

/**
 * One entry of a loaded index.
 */
export interface IndexEntry {
  id: string;
  content: string;
  embedding: number[];
  metadata: SnippetMetadata;
}

/**
 * Result of a similarity search.
 */
export interface SearchResult {
  entry: IndexEntry;
  score: number; // Cosine similarity, higher = more similar
}

/**
 * Interface for vector store operations.
 */
export interface IVectorStore {
  addMany(entries: IndexEntry[]): void;
  search(queryEmbedding: number[], limit: number): SearchResult[];
  /** Embedding width shared by every entry, undefined while empty */
  dimension(): number | undefined;
  size(): number;
}

/**
 * Calculate cosine similarity between two vectors.
 *
 * Formula: cos(θ) = (A · B) / (||A|| × ||B||)
 *
 * - 1.0 = identical direction
 * - 0.0 = unrelated
 * - -1.0 = opposite
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  if (a.length === 0) {
    return 0;
  }

  let dotProduct = 0;
  let magnitudeA = 0;
  let magnitudeB = 0;

  for (let i = 0; i < a.length; i++) {
    const aVal = a[i] ?? 0;
    const bVal = b[i] ?? 0;
    dotProduct += aVal * bVal;
    magnitudeA += aVal * aVal;
    magnitudeB += bVal * bVal;
  }

  const magnitude = Math.sqrt(magnitudeA) * Math.sqrt(magnitudeB);

  // Zero vectors have no direction
  if (magnitude === 0) {
    return 0;
  }

  return dotProduct / magnitude;
}

/**
 * In-memory Vector Store implementation.
 *
 * Entries keep their insertion order, which is also the tie-break order
 * for equal scores (Array.prototype.sort is stable).
 */
export class InMemoryVectorStore implements IVectorStore {
  private readonly entries: IndexEntry[] = [];
  private width: number | undefined;

  /**
   * Add entries to the store.
   *
   * @throws Error if an entry's embedding width differs from the others
   */
  addMany(entries: IndexEntry[]): void {
    for (const entry of entries) {
      if (this.width === undefined) {
        this.width = entry.embedding.length;
      } else if (entry.embedding.length !== this.width) {
        throw new Error(
          `Entry "${entry.id}" has dimension ${entry.embedding.length}, expected ${this.width}`
        );
      }
      this.entries.push(entry);
    }
  }

  /**
   * Search for entries most similar to the query embedding.
   *
   * @param queryEmbedding - The embedding vector to search for
   * @param limit - Maximum number of results to return
   * @returns Results sorted by similarity (highest first)
   */
  search(queryEmbedding: number[], limit: number): SearchResult[] {
    if (limit <= 0) {
      return [];
    }

    const results: SearchResult[] = this.entries.map((entry) => ({
      entry,
      score: cosineSimilarity(queryEmbedding, entry.embedding),
    }));

    results.sort((a, b) => b.score - a.score);

    return results.slice(0, limit);
  }

  dimension(): number | undefined {
    return this.width;
  }

  size(): number {
    return this.entries.length;
  }
}

/**
 * Factory function to create a vector store.
 */
export function createVectorStore(): IVectorStore {
  return new InMemoryVectorStore();
}
