/**
 * @file Random-hyperplane LSH for cosine similarity.
 *
 * Each table hashes a vector to a `hyperplanes`-bit code: bit i is set when the
 * vector lies on the positive side of hyperplane i. Vectors with a small angle
 * between them agree on most bits. Queries probe every bucket whose code is
 * within `probeRadius` bit flips of the query code, in every table.
 */

import type { AnnConfig } from './models';
import { dot } from './vector_math';

// ============================================================================
// Seeded randomness
// ============================================================================

/**
 * mulberry32: deterministic 32-bit PRNG, uniform in [0, 1).
 */
export function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function gaussian(rng: () => number): number {
  // Box-Muller
  const u1 = 1 - rng();
  const u2 = rng();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

// ============================================================================
// Hasher (hyperplanes, shared by every partition)
// ============================================================================

export class HyperplaneHasher {
  private readonly planes: Float64Array[][];

  constructor(
    readonly dimension: number,
    readonly config: Pick<AnnConfig, 'tables' | 'hyperplanes' | 'seed'>
  ) {
    const rng = createRng(config.seed);
    this.planes = [];
    for (let t = 0; t < config.tables; t++) {
      const table: Float64Array[] = [];
      for (let h = 0; h < config.hyperplanes; h++) {
        const plane = new Float64Array(dimension);
        for (let d = 0; d < dimension; d++) {
          plane[d] = gaussian(rng);
        }
        table.push(plane);
      }
      this.planes.push(table);
    }
  }

  /**
   * One code per table.
   */
  codes(vector: ArrayLike<number>): number[] {
    return this.planes.map((table) => {
      let code = 0;
      table.forEach((plane, bit) => {
        if (dot(plane, vector) >= 0) {
          code |= 1 << bit;
        }
      });
      return code;
    });
  }
}

/**
 * All codes within `radius` bit flips of `code`, including `code` itself.
 */
export function probeCodes(code: number, bits: number, radius: number): number[] {
  const result = [code];
  let frontier = [{ code, lowestBit: 0 }];
  for (let distance = 1; distance <= radius; distance++) {
    const next: Array<{ code: number; lowestBit: number }> = [];
    for (const entry of frontier) {
      for (let bit = entry.lowestBit; bit < bits; bit++) {
        const flipped = entry.code ^ (1 << bit);
        result.push(flipped);
        next.push({ code: flipped, lowestBit: bit + 1 });
      }
    }
    frontier = next;
  }
  return result;
}

// ============================================================================
// Index (buckets for one partition)
// ============================================================================

export class LshIndex {
  private readonly buckets: Array<Map<number, Set<string>>>;
  private readonly codesById = new Map<string, number[]>();

  constructor(
    private readonly hasher: HyperplaneHasher,
    private readonly probeRadius: number
  ) {
    this.buckets = Array.from({ length: hasher.config.tables }, () => new Map<number, Set<string>>());
  }

  get size(): number {
    return this.codesById.size;
  }

  /**
   * Insert or move an id. No rebuild is needed.
   */
  add(id: string, vector: ArrayLike<number>): void {
    this.remove(id);
    const codes = this.hasher.codes(vector);
    codes.forEach((code, table) => {
      let bucket = this.buckets[table].get(code);
      if (!bucket) {
        bucket = new Set<string>();
        this.buckets[table].set(code, bucket);
      }
      bucket.add(id);
    });
    this.codesById.set(id, codes);
  }

  remove(id: string): void {
    const codes = this.codesById.get(id);
    if (!codes) return;
    codes.forEach((code, table) => {
      const bucket = this.buckets[table].get(code);
      if (!bucket) return;
      bucket.delete(id);
      if (bucket.size === 0) {
        this.buckets[table].delete(code);
      }
    });
    this.codesById.delete(id);
  }

  /**
   * Ids sharing a probed bucket with the query in at least one table.
   */
  candidates(query: ArrayLike<number>): Set<string> {
    const found = new Set<string>();
    const bits = this.hasher.config.hyperplanes;
    this.hasher.codes(query).forEach((code, table) => {
      for (const probe of probeCodes(code, bits, this.probeRadius)) {
        const bucket = this.buckets[table].get(probe);
        if (bucket) {
          for (const id of bucket) found.add(id);
        }
      }
    });
    return found;
  }
}
