import type { EntityId } from '../core/contracts.js';
import type { Neighbor, VectorIndex } from '../sources/types.js';
import { cosineSimilarity, l2Normalize } from '../utils/math.js';

export interface VectorIndexItem {
  entityId: EntityId;
  embedding: Float32Array | readonly number[];
}

/**
 * Brute-force entity embedding index.
 *
 * Vectors are L2-normalized on insertion, so the similarity of two stored
 * vectors is their dot product; `cosineSimilarity` still normalizes to
 * accept foreign vectors.
 *
 * @example
 * ```typescript
 * const index = new InMemoryVectorIndex();
 * index.load([{ entityId, embedding }]);
 * const neighbors = await index.nearestNeighbors(entityId, 20);
 * ```
 */
export class InMemoryVectorIndex implements VectorIndex {
  private vectors = new Map<EntityId, Float32Array>();
  private dimensions = new Set<number>();

  /**
   * Replace the index contents.
   */
  load(items: Iterable<VectorIndexItem>): void {
    this.clear();
    for (const item of items) {
      this.add(item);
    }
  }

  /**
   * Add or replace a single vector.
   */
  add(item: VectorIndexItem): void {
    const normalized = l2Normalize(item.embedding);
    this.vectors.set(item.entityId, normalized);
    this.dimensions.add(normalized.length);
  }

  removeById(entityId: EntityId): boolean {
    return this.vectors.delete(entityId);
  }

  clear(): void {
    this.vectors.clear();
    this.dimensions.clear();
  }

  size(): number { return this.vectors.size; }

  hasDimension(length: number): boolean { return this.dimensions.has(length); }

  embeddingOf(entityId: EntityId): Float32Array | undefined {
    return this.vectors.get(entityId);
  }

  cosineSimilarity(a: Float32Array, b: Float32Array): number {
    return cosineSimilarity(a, b);
  }

  /**
   * The `k` most similar other entities, best first. Vectors of another
   * dimension are skipped. Ties keep insertion order.
   */
  async nearestNeighbors(entityId: EntityId, k: number): Promise<Neighbor[]> {
    const query = this.vectors.get(entityId);
    if (!query || k <= 0) return [];

    const results: Neighbor[] = [];
    for (const [candidateId, vector] of this.vectors) {
      if (candidateId === entityId) continue;
      if (vector.length !== query.length) continue;
      results.push({ entityId: candidateId, similarity: dot(query, vector) });
    }

    results.sort((a, b) => b.similarity - a.similarity);
    return results.slice(0, k);
  }
}

function dot(a: Float32Array, b: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}
