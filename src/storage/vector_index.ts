import { cosineDistance } from '../utils/math.js';

export interface VectorIndexItem {
  recordId: string;
  vector: Float32Array;
}

export interface VectorHit {
  recordId: string;
  /** Cosine distance in [0, 2]. */
  distance: number;
}

// ============================================================================
// HNSW (Hierarchical Navigable Small World) Index
// Provides O(log n) approximate nearest neighbor search
// ============================================================================

/**
 * Configuration for HNSW index.
 *
 * @param M - Maximum number of connections per node per layer (default: 16)
 *   Higher M = better recall but more memory and slower insertion
 * @param efConstruction - Size of dynamic candidate list during construction (default: 200)
 * @param efSearch - Size of dynamic candidate list during search (default: 50)
 */
export interface HNSWConfig {
  M: number;
  efConstruction: number;
  efSearch: number;
}

export const DEFAULT_HNSW_CONFIG: HNSWConfig = {
  M: 16,
  efConstruction: 200,
  efSearch: 50,
};

interface HNSWNode {
  id: string;
  vector: Float32Array;
  /** Connections per layer: layer index -> array of connected node IDs */
  connections: Map<number, string[]>;
}

interface Scored {
  id: string;
  distance: number;
}

const byDistance = (a: Scored, b: Scored): number => a.distance - b.distance;

/**
 * HNSW graph over alias vectors.
 *
 * Based on "Efficient and robust approximate nearest neighbor search using
 * Hierarchical Navigable Small World graphs" (Malkov & Yashunin, 2018).
 *
 * @example
 * ```typescript
 * const hnsw = new HNSWIndex({ M: 16, efConstruction: 200, efSearch: 50 });
 * hnsw.insert('Sales::Customer::client', vector);
 * const hits = hnsw.search(queryVector, 10, (id) => poolIds.has(id));
 * ```
 */
export class HNSWIndex {
  private nodes: Map<string, HNSWNode> = new Map();
  private entryPoint: string | null = null;
  private maxLayer: number = 0;
  private config: HNSWConfig;
  private dimensions: Set<number> = new Set();

  constructor(config: Partial<HNSWConfig> = {}) {
    this.config = {
      M: config.M ?? DEFAULT_HNSW_CONFIG.M,
      efConstruction: config.efConstruction ?? DEFAULT_HNSW_CONFIG.efConstruction,
      efSearch: config.efSearch ?? DEFAULT_HNSW_CONFIG.efSearch,
    };
  }

  size(): number {
    return this.nodes.size;
  }

  /**
   * True when every vector in the graph has exactly this dimension.
   */
  hasOnlyDimension(length: number): boolean {
    return this.dimensions.size === 1 && this.dimensions.has(length);
  }

  clear(): void {
    this.nodes.clear();
    this.entryPoint = null;
    this.maxLayer = 0;
    this.dimensions.clear();
  }

  /**
   * Exponential distribution with mean 1/ln(M).
   */
  private getRandomLevel(): number {
    const ml = 1 / Math.log(this.config.M);
    return Math.floor(-Math.log(Math.random()) * ml);
  }

  insert(id: string, vector: Float32Array): void {
    const existing = this.nodes.get(id);
    if (existing) {
      existing.vector = vector;
      return;
    }

    this.dimensions.add(vector.length);
    const level = this.getRandomLevel();
    const node: HNSWNode = { id, vector, connections: new Map() };

    if (this.entryPoint === null) {
      this.nodes.set(id, node);
      this.entryPoint = id;
      this.maxLayer = level;
      return;
    }

    let currentNodeId = this.entryPoint;

    // Phase 1: greedy descent from the top layer down to level+1
    for (let l = this.maxLayer; l > level; l--) {
      const closest = this.searchLayer(vector, currentNodeId, 1, l)[0];
      if (closest) currentNodeId = closest.id;
    }

    // Phase 2: link at each layer from min(level, maxLayer) down to 0
    for (let l = Math.min(level, this.maxLayer); l >= 0; l--) {
      const neighbors = this.searchLayer(vector, currentNodeId, this.config.efConstruction, l);
      const selected = [...neighbors].sort(byDistance).slice(0, this.config.M);

      node.connections.set(l, selected.map((n) => n.id));

      for (const neighbor of selected) {
        const neighborNode = this.nodes.get(neighbor.id);
        if (neighborNode) this.linkBack(neighborNode, id, vector, l);
      }

      const nearest = selected[0];
      if (nearest) currentNodeId = nearest.id;
    }

    this.nodes.set(id, node);

    if (level > this.maxLayer) {
      this.maxLayer = level;
      this.entryPoint = id;
    }
  }

  private linkBack(neighborNode: HNSWNode, id: string, vector: Float32Array, layer: number): void {
    const existingConns = neighborNode.connections.get(layer) ?? [];
    if (existingConns.length < this.config.M * 2) {
      existingConns.push(id);
      neighborNode.connections.set(layer, existingConns);
      return;
    }

    // At capacity: replace the farthest connection if the new node is closer
    const newDist = cosineDistance(vector, neighborNode.vector);
    let farthestDist = -1;
    let farthestIdx = -1;
    existingConns.forEach((connId, i) => {
      const connNode = this.nodes.get(connId);
      if (!connNode) return;
      const dist = cosineDistance(connNode.vector, neighborNode.vector);
      if (dist > farthestDist) {
        farthestDist = dist;
        farthestIdx = i;
      }
    });
    if (farthestIdx >= 0 && newDist < farthestDist) {
      existingConns[farthestIdx] = id;
    }
  }

  /**
   * k nearest neighbors of `query` among nodes accepted by `accept`.
   *
   * The layer-0 beam is widened to `ef` (at least `efSearch`) before filtering,
   * so callers with a selective filter should oversample.
   */
  search(
    query: Float32Array,
    k: number,
    accept: (id: string) => boolean = () => true,
    ef: number = this.config.efSearch
  ): VectorHit[] {
    if (this.entryPoint === null || this.nodes.size === 0 || k <= 0) {
      return [];
    }

    let currentNodeId = this.entryPoint;
    for (let l = this.maxLayer; l > 0; l--) {
      const closest = this.searchLayer(query, currentNodeId, 1, l)[0];
      if (closest) currentNodeId = closest.id;
    }

    const beam = Math.max(ef, this.config.efSearch, k);
    const candidates = this.searchLayer(query, currentNodeId, beam, 0);

    const results: VectorHit[] = [];
    for (const candidate of candidates) {
      if (!accept(candidate.id)) continue;
      results.push({ recordId: candidate.id, distance: candidate.distance });
      if (results.length >= k) break;
    }
    return results;
  }

  /**
   * Greedy beam search within one layer; returns candidates ascending by distance.
   */
  private searchLayer(query: Float32Array, entryId: string, ef: number, layer: number): Scored[] {
    const entryNode = this.nodes.get(entryId);
    if (!entryNode) return [];

    const visited = new Set<string>([entryId]);
    const entryDist = cosineDistance(query, entryNode.vector);
    const candidates: Scored[] = [{ id: entryId, distance: entryDist }];
    const results: Scored[] = [{ id: entryId, distance: entryDist }];

    let current = candidates.shift();
    while (current) {
      const farthest = results[results.length - 1];
      if (farthest && current.distance > farthest.distance && results.length >= ef) {
        break;
      }

      const node = this.nodes.get(current.id);
      for (const connId of node?.connections.get(layer) ?? []) {
        if (visited.has(connId)) continue;
        visited.add(connId);

        const connNode = this.nodes.get(connId);
        if (!connNode) continue;

        const dist = cosineDistance(query, connNode.vector);
        const resultFarthest = results[results.length - 1];
        if (results.length < ef || (resultFarthest && dist < resultFarthest.distance)) {
          candidates.push({ id: connId, distance: dist });
          results.push({ id: connId, distance: dist });
          results.sort(byDistance);
          if (results.length > ef) results.pop();
        }
      }

      candidates.sort(byDistance);
      current = candidates.shift();
    }

    return results.sort(byDistance);
  }

  getStats(): {
    nodeCount: number;
    maxLayer: number;
    avgConnectionsPerNode: number;
    entryPoint: string | null;
  } {
    let totalConnections = 0;
    for (const node of this.nodes.values()) {
      for (const conns of node.connections.values()) {
        totalConnections += conns.length;
      }
    }
    return {
      nodeCount: this.nodes.size,
      maxLayer: this.maxLayer,
      avgConnectionsPerNode: this.nodes.size > 0 ? totalConnections / this.nodes.size : 0,
      entryPoint: this.entryPoint,
    };
  }
}

// ============================================================================
// VectorIndex with Optional HNSW Mode
// ============================================================================

/**
 * Pool size at and above which the approximate path is used.
 * Below this size, brute-force is fast enough.
 */
export const HNSW_AUTO_THRESHOLD = 1000;

export interface VectorIndexConfig {
  /** `'auto'` builds the HNSW graph once the index reaches `approximateThreshold`. */
  useApproximate?: 'auto' | 'never';
  approximateThreshold?: number;
  hnswConfig?: Partial<HNSWConfig>;
}

export interface VectorSearchOptions {
  limit: number;
  maxDistance: number;
  /** Restrict hits to these record ids. Omitted means every record. */
  pool?: ReadonlySet<string>;
}

export class VectorIndex {
  private items: VectorIndexItem[] = [];
  private hnswIndex: HNSWIndex | null = null;
  private readonly useApproximate: 'auto' | 'never';
  private readonly approximateThreshold: number;
  private readonly hnswConfig: Partial<HNSWConfig> | undefined;

  constructor(config: VectorIndexConfig = {}) {
    this.useApproximate = config.useApproximate ?? 'auto';
    this.approximateThreshold = Math.max(1, config.approximateThreshold ?? HNSW_AUTO_THRESHOLD);
    this.hnswConfig = config.hnswConfig;
  }

  /**
   * Replace the contents. Builds the HNSW graph when the index is large enough.
   */
  load(items: VectorIndexItem[]): void {
    this.items = [...items];
    if (this.useApproximate === 'auto' && items.length >= this.approximateThreshold) {
      const hnsw = new HNSWIndex(this.hnswConfig);
      for (const item of items) {
        hnsw.insert(item.recordId, item.vector);
      }
      this.hnswIndex = hnsw;
    } else {
      this.hnswIndex = null;
    }
  }

  clear(): void {
    this.items = [];
    this.hnswIndex = null;
  }

  size(): number {
    return this.items.length;
  }

  /**
   * Whether a pool of this size would be answered by the HNSW graph.
   */
  isUsingApproximate(poolSize: number = this.items.length): boolean {
    return this.hnswIndex !== null && poolSize >= this.approximateThreshold;
  }

  getHNSWStats(): ReturnType<HNSWIndex['getStats']> | null {
    return this.hnswIndex?.getStats() ?? null;
  }

  /**
   * Nearest records ascending by cosine distance, at most `limit`, each within
   * `maxDistance`. Ties keep load order.
   */
  search(query: Float32Array, options: VectorSearchOptions): VectorHit[] {
    const { limit, maxDistance, pool } = options;
    if (limit <= 0) return [];
    const poolSize = pool?.size ?? this.items.length;

    if (this.hnswIndex && this.isUsingApproximate(poolSize) && this.hnswIndex.hasOnlyDimension(query.length)) {
      const oversample = Math.ceil((limit * this.items.length) / Math.max(1, poolSize));
      const hits = this.hnswIndex.search(query, limit, pool ? (id) => pool.has(id) : undefined, oversample);
      return hits.filter((hit) => hit.distance <= maxDistance);
    }

    return this.bruteForce(query, limit, maxDistance, pool);
  }

  private bruteForce(
    query: Float32Array,
    limit: number,
    maxDistance: number,
    pool: ReadonlySet<string> | undefined
  ): VectorHit[] {
    const results: VectorHit[] = [];
    for (const item of this.items) {
      if (pool && !pool.has(item.recordId)) continue;
      if (item.vector.length !== query.length) continue;
      const distance = cosineDistance(query, item.vector);
      if (distance <= maxDistance) {
        results.push({ recordId: item.recordId, distance });
      }
    }
    results.sort((a, b) => a.distance - b.distance);
    return results.slice(0, limit);
  }
}
