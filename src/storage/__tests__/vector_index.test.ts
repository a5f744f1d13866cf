/**
 * @fileoverview Tests for VectorIndex with HNSW support
 *
 * Tests cover:
 * - HNSWIndex standalone functionality
 * - VectorIndex brute-force mode
 * - VectorIndex switching to HNSW at the pool-size threshold
 */

import { describe, it, expect } from 'vitest';
import { HNSWIndex, HNSW_AUTO_THRESHOLD, VectorIndex, type VectorIndexItem } from '../vector_index.js';

// ============================================================================
// TEST UTILITIES
// ============================================================================

const STEP = 0.05;

/** Unit vector at `angle` radians in the plane. */
function planar(angle: number): Float32Array {
  return new Float32Array([Math.cos(angle), Math.sin(angle)]);
}

/** Items `0..count-1`, item i at angle i * STEP; distance grows with angle gap. */
function fan(count: number): VectorIndexItem[] {
  return Array.from({ length: count }, (_, i) => ({ recordId: String(i), vector: planar(i * STEP) }));
}

const ids = (hits: Array<{ recordId: string }>): string[] => hits.map((hit) => hit.recordId);

// ============================================================================
// HNSW INDEX
// ============================================================================

describe('HNSWIndex', () => {
  it('finds nearest neighbours in ascending distance order', () => {
    const hnsw = new HNSWIndex();
    for (const item of fan(40)) hnsw.insert(item.recordId, item.vector);

    const hits = hnsw.search(planar(7.2 * STEP), 3);

    expect(ids(hits)).toEqual(['7', '8', '6']);
    expect(hits[0]?.distance).toBeLessThan(hits[1]?.distance ?? 0);
  });

  it('filters candidates through the accept callback', () => {
    const hnsw = new HNSWIndex();
    for (const item of fan(40)) hnsw.insert(item.recordId, item.vector);

    const hits = hnsw.search(planar(7.2 * STEP), 2, (id) => Number(id) % 2 === 0);

    expect(ids(hits)).toEqual(['8', '6']);
  });

  it('replaces the vector of an existing id instead of adding a node', () => {
    const hnsw = new HNSWIndex();
    hnsw.insert('a', planar(0));
    hnsw.insert('b', planar(1));
    hnsw.insert('a', planar(1.5));

    expect(hnsw.size()).toBe(2);
    expect(ids(hnsw.search(planar(1.5), 1))).toEqual(['a']);
  });

  it('tracks dimensions and clears completely', () => {
    const hnsw = new HNSWIndex({ M: 4 });
    hnsw.insert('a', planar(0));

    expect(hnsw.hasOnlyDimension(2)).toBe(true);
    expect(hnsw.hasOnlyDimension(3)).toBe(false);

    hnsw.clear();
    expect(hnsw.getStats()).toEqual({ nodeCount: 0, maxLayer: 0, avgConnectionsPerNode: 0, entryPoint: null });
    expect(hnsw.search(planar(0), 1)).toEqual([]);
  });
});

// ============================================================================
// VECTOR INDEX
// ============================================================================

describe('VectorIndex', () => {
  it('defaults the approximate threshold to 1000 records', () => {
    expect(HNSW_AUTO_THRESHOLD).toBe(1000);
    const index = new VectorIndex();
    index.load(fan(40));

    expect(index.isUsingApproximate()).toBe(false);
    expect(index.getHNSWStats()).toBeNull();
  });

  it('brute-forces small indexes within maxDistance and limit', () => {
    const index = new VectorIndex();
    index.load(fan(10));

    // Items 3, 4, 2, 5, 1 lie within 0.12 rad of the query; item 6 is 0.14 away
    const hits = index.search(planar(3.2 * STEP), { limit: 10, maxDistance: 1 - Math.cos(0.12) });

    expect(ids(hits)).toEqual(['3', '4', '2', '5', '1']);

    const limited = index.search(planar(3.2 * STEP), { limit: 2, maxDistance: 2 });
    expect(ids(limited)).toEqual(['3', '4']);
  });

  it('restricts brute-force hits to the pool', () => {
    const index = new VectorIndex();
    index.load(fan(10));

    const hits = index.search(planar(3 * STEP), { limit: 2, maxDistance: 2, pool: new Set(['9', '0', '5']) });

    expect(ids(hits)).toEqual(['5', '0']);
  });

  it('keeps load order for equal distances and skips other dimensions', () => {
    const index = new VectorIndex();
    index.load([
      { recordId: 'x', vector: planar(0.5) },
      { recordId: 'three-d', vector: new Float32Array([1, 0, 0]) },
      { recordId: 'y', vector: planar(0.5) },
    ]);

    expect(ids(index.search(planar(0.5), { limit: 5, maxDistance: 2 }))).toEqual(['x', 'y']);
  });

  it('switches to HNSW once a pool reaches the threshold', () => {
    const index = new VectorIndex({ approximateThreshold: 10 });
    index.load(fan(40));

    expect(index.isUsingApproximate()).toBe(true);
    expect(index.isUsingApproximate(20)).toBe(true);
    expect(index.isUsingApproximate(9)).toBe(false);
    expect(index.getHNSWStats()?.nodeCount).toBe(40);

    const evens = new Set(fan(40).filter((_, i) => i % 2 === 0).map((item) => item.recordId));
    const hits = index.search(planar(7.2 * STEP), { limit: 2, maxDistance: 2, pool: evens });
    expect(ids(hits)).toEqual(['8', '6']);
  });

  it('applies maxDistance to approximate hits', () => {
    const index = new VectorIndex({ approximateThreshold: 10 });
    index.load(fan(40));

    // Only item 7 lies within 0.01 rad of the query
    const hits = index.search(planar(7.2 * STEP), { limit: 5, maxDistance: 1 - Math.cos(0.02) });
    expect(ids(hits)).toEqual(['7']);
  });

  it('never builds a graph when approximate search is disabled', () => {
    const index = new VectorIndex({ approximateThreshold: 10, useApproximate: 'never' });
    index.load(fan(40));

    expect(index.isUsingApproximate()).toBe(false);
    expect(ids(index.search(planar(7.2 * STEP), { limit: 1, maxDistance: 2 }))).toEqual(['7']);
  });

  it('returns nothing for a non-positive limit and after clear', () => {
    const index = new VectorIndex();
    index.load(fan(3));

    expect(index.search(planar(0), { limit: 0, maxDistance: 2 })).toEqual([]);
    index.clear();
    expect(index.size()).toBe(0);
    expect(index.search(planar(0), { limit: 3, maxDistance: 2 })).toEqual([]);
  });
});
