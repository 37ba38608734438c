/**
 * @file Types for the hint embedding store.
 */

import type { HintSource } from '../../models/validation';

export type Vector = number[];

/**
 * A free-text observation about the partner. `embedding` stays null until the
 * embedding collaborator returns a vector; such rows are never returned by
 * similarity queries.
 */
export interface HintDocument {
  hintId: string;
  vaultId: string;
  text: string;
  source: HintSource;
  /** Unit-normalised, or null while pending */
  embedding: Vector | null;
  /** Set once, on confirmed selection of a recommendation it boosted */
  isUsed: boolean;
  createdAt: string;
  embeddedAt: string | null;
}

export interface SimilarityMatch {
  hintId: string;
  vaultId: string;
  text: string;
  /** max(0, cosine), in [0, 1] */
  similarity: number;
  isUsed: boolean;
}

export interface SimilarityQueryOptions {
  /** Minimum similarity, inclusive. Default 0. */
  threshold?: number;
  /** Result cap. Default 10. */
  limit?: number;
  /** Include hints already consumed by a selection. Default false. */
  includeUsed?: boolean;
  /** Force a linear scan even when the partition is LSH-indexed. */
  exact?: boolean;
}

export interface AnnConfig {
  /** Partitions with fewer embedded rows than this are scanned linearly */
  linearScanThreshold: number;
  /** Independent hash tables */
  tables: number;
  /** Hyperplanes (bits) per table */
  hyperplanes: number;
  /** Buckets within this Hamming distance of the query code are probed */
  probeRadius: number;
  seed: number;
}

export interface EmbeddingStoreConfig extends AnnConfig {
  dimension: number;
  /** Vault partitions kept in memory; the least recently queried is evicted first */
  maxCachedPartitions: number;
}

export const DEFAULT_EMBEDDING_STORE_CONFIG: EmbeddingStoreConfig = {
  dimension: 768,
  linearScanThreshold: 256,
  tables: 8,
  hyperplanes: 12,
  probeRadius: 1,
  seed: 42,
  maxCachedPartitions: 128,
};

/**
 * Summary of a vault's embedded rows. A cached partition whose own summary
 * differs from the stored one has missed a write and is reloaded.
 */
export interface PartitionFingerprint {
  embedded: number;
  used: number;
  latestEmbeddedAt: string | null;
}

/**
 * Persistence seam for hints.
 */
export interface HintStore {
  insert(hint: HintDocument): Promise<void>;
  findById(hintId: string): Promise<HintDocument | null>;
  /** Newest first */
  listByVault(vaultId: string, options: { includeUsed: boolean; limit?: number }): Promise<HintDocument[]>;
  listEmbedded(vaultId: string): Promise<HintDocument[]>;
  embeddingFingerprint(vaultId: string): Promise<PartitionFingerprint>;
  listMissingEmbeddings(limit: number): Promise<HintDocument[]>;
  setEmbedding(hintId: string, embedding: Vector | null, embeddedAt: string): Promise<boolean>;
  /** Returns the number of hints that flipped to used */
  markUsed(hintIds: string[]): Promise<number>;
  deleteByVault(vaultId: string): Promise<number>;
}
