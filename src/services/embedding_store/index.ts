/**
 * @file Embedding Store
 *
 * Persists hints through a HintStore and answers cosine k-NN queries scoped to
 * one vault. Each vault is an independent partition held in memory: small
 * partitions are scanned linearly, larger ones are served by a random-hyperplane
 * LSH index that grows with every insert.
 *
 * Vectors written through this store become visible to the next query. A
 * cached partition is checked against the stored fingerprint of its vault before
 * each query, so rows written by other processes are picked up too. Hints with a
 * null vector are kept out of every partition.
 */

import { v4 as uuidv4 } from 'uuid';
import { logger, shortId } from '../../utils/logger';
import { NotFoundError, ValidationError } from '../../utils/errors';
import { HyperplaneHasher, LshIndex } from './lsh_index';
import { checkVector, clampSimilarity, dot, normalize } from './vector_math';
import {
  DEFAULT_EMBEDDING_STORE_CONFIG,
  type EmbeddingStoreConfig,
  type HintDocument,
  type HintStore,
  type PartitionFingerprint,
  type SimilarityMatch,
  type SimilarityQueryOptions,
  type Vector,
} from './models';
import type { HintSource } from '../../models/validation';

export * from './models';

const DEFAULT_QUERY_LIMIT = 10;

interface PartitionEntry {
  hintId: string;
  text: string;
  vector: Float64Array;
  isUsed: boolean;
  embeddedAt: string | null;
}

class Partition {
  readonly entries = new Map<string, PartitionEntry>();
  private lsh: LshIndex | null = null;

  constructor(
    private readonly hasher: HyperplaneHasher,
    private readonly config: EmbeddingStoreConfig
  ) {}

  get indexed(): boolean {
    return this.lsh !== null;
  }

  upsert(entry: PartitionEntry): void {
    this.entries.set(entry.hintId, entry);
    if (this.lsh) {
      this.lsh.add(entry.hintId, entry.vector);
    } else if (this.entries.size >= this.config.linearScanThreshold) {
      this.buildIndex();
    }
  }

  remove(hintId: string): void {
    this.entries.delete(hintId);
    this.lsh?.remove(hintId);
  }

  fingerprint(): PartitionFingerprint {
    let used = 0;
    let latestEmbeddedAt: string | null = null;
    for (const entry of this.entries.values()) {
      if (entry.isUsed) used++;
      if (entry.embeddedAt !== null && (latestEmbeddedAt === null || entry.embeddedAt > latestEmbeddedAt)) {
        latestEmbeddedAt = entry.embeddedAt;
      }
    }
    return { embedded: this.entries.size, used, latestEmbeddedAt };
  }

  candidates(query: Float64Array, exact: boolean): Iterable<PartitionEntry> {
    if (exact || !this.lsh) {
      return this.entries.values();
    }
    const found: PartitionEntry[] = [];
    for (const id of this.lsh.candidates(query)) {
      const entry = this.entries.get(id);
      if (entry) found.push(entry);
    }
    return found;
  }

  private buildIndex(): void {
    const lsh = new LshIndex(this.hasher, this.config.probeRadius);
    for (const entry of this.entries.values()) {
      lsh.add(entry.hintId, entry.vector);
    }
    this.lsh = lsh;
    logger.debug(`[EmbeddingStore] Partition switched to LSH at ${this.entries.size} rows`);
  }
}

export interface NewHint {
  vaultId: string;
  text: string;
  source: HintSource;
  embedding?: Vector | null;
}

export class EmbeddingStore {
  readonly config: EmbeddingStoreConfig;
  private readonly hasher: HyperplaneHasher;
  private readonly partitions = new Map<string, Promise<Partition>>();

  constructor(
    private readonly store: HintStore,
    config: Partial<EmbeddingStoreConfig> = {}
  ) {
    this.config = { ...DEFAULT_EMBEDDING_STORE_CONFIG, ...config };
    this.hasher = new HyperplaneHasher(this.config.dimension, this.config);
  }

  /**
   * Persist a hint. A supplied vector is validated and stored unit-normalised.
   */
  async insert(input: NewHint, now: Date = new Date()): Promise<HintDocument> {
    const embedding = input.embedding ? this.prepare(input.embedding) : null;
    const timestamp = now.toISOString();
    const hint: HintDocument = {
      hintId: uuidv4(),
      vaultId: input.vaultId,
      text: input.text,
      source: input.source,
      embedding,
      isUsed: false,
      createdAt: timestamp,
      embeddedAt: embedding ? timestamp : null,
    };

    await this.store.insert(hint);
    if (embedding) {
      await this.applyToPartition(hint);
    }
    logger.debug(`[EmbeddingStore] Hint ${shortId(hint.hintId)} stored (embedded: ${embedding !== null})`);
    return hint;
  }

  /**
   * Attach (or clear) a hint's vector. The hint joins or leaves its vault's
   * partition immediately.
   */
  async setEmbedding(hintId: string, vector: Vector | null, now: Date = new Date()): Promise<HintDocument> {
    const embedding = vector ? this.prepare(vector) : null;
    const updated = await this.store.setEmbedding(hintId, embedding, now.toISOString());
    if (!updated) {
      throw new NotFoundError('Hint', hintId);
    }

    const hint = await this.store.findById(hintId);
    if (!hint) {
      throw new NotFoundError('Hint', hintId);
    }
    await this.applyToPartition(hint);
    return hint;
  }

  /**
   * The `limit` most similar embedded hints of one vault, most similar first.
   * Ties order by hint id.
   */
  async query(vaultId: string, vector: Vector, options: SimilarityQueryOptions = {}): Promise<SimilarityMatch[]> {
    const query = Float64Array.from(this.prepare(vector, 'query'));
    const threshold = options.threshold ?? 0;
    const limit = options.limit ?? DEFAULT_QUERY_LIMIT;
    const includeUsed = options.includeUsed ?? false;

    const partition = await this.freshPartition(vaultId);
    const matches: SimilarityMatch[] = [];
    for (const entry of partition.candidates(query, options.exact ?? false)) {
      if (entry.isUsed && !includeUsed) continue;
      const similarity = clampSimilarity(dot(entry.vector, query));
      if (similarity < threshold) continue;
      matches.push({ hintId: entry.hintId, vaultId, text: entry.text, similarity, isUsed: entry.isUsed });
    }

    matches.sort((a, b) => b.similarity - a.similarity || a.hintId.localeCompare(b.hintId));
    return matches.slice(0, limit);
  }

  /**
   * Chronological listing (newest first), used when no query vector exists.
   */
  async listRecent(vaultId: string, options: { includeUsed?: boolean; limit?: number } = {}): Promise<HintDocument[]> {
    return this.store.listByVault(vaultId, {
      includeUsed: options.includeUsed ?? false,
      limit: options.limit,
    });
  }

  async listMissingEmbeddings(limit: number): Promise<HintDocument[]> {
    return this.store.listMissingEmbeddings(limit);
  }

  /**
   * Flag hints as consumed. Only called on confirmed selection.
   */
  async markUsed(vaultId: string, hintIds: string[]): Promise<number> {
    if (hintIds.length === 0) return 0;
    const changed = await this.store.markUsed(hintIds);

    const loading = this.partitions.get(vaultId);
    if (loading) {
      const partition = await loading;
      for (const id of hintIds) {
        const entry = partition.entries.get(id);
        if (entry) entry.isUsed = true;
      }
    }
    return changed;
  }

  async deleteVault(vaultId: string): Promise<number> {
    this.partitions.delete(vaultId);
    const deleted = await this.store.deleteByVault(vaultId);
    logger.info(`[EmbeddingStore] Deleted ${deleted} hints for vault ${shortId(vaultId)}`);
    return deleted;
  }

  /**
   * Drop the cached partition so the next query reloads it from storage.
   */
  invalidate(vaultId: string): void {
    this.partitions.delete(vaultId);
  }

  async partitionStats(vaultId: string): Promise<{ rows: number; indexed: boolean }> {
    const partition = await this.freshPartition(vaultId);
    return { rows: partition.entries.size, indexed: partition.indexed };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private prepare(vector: Vector, field = 'embedding'): Vector {
    const problem = checkVector(vector, this.config.dimension, field);
    if (problem) {
      throw new ValidationError([problem]);
    }
    return normalize(vector);
  }

  /**
   * The vault's partition, reloaded when storage holds writes it has not seen.
   */
  private async freshPartition(vaultId: string): Promise<Partition> {
    if (!this.partitions.has(vaultId)) {
      return this.partition(vaultId);
    }

    const partition = await this.partition(vaultId);
    const stored = await this.store.embeddingFingerprint(vaultId);
    if (sameFingerprint(stored, partition.fingerprint())) {
      return partition;
    }

    logger.debug(`[EmbeddingStore] Partition for vault ${shortId(vaultId)} is stale, reloading`);
    this.invalidate(vaultId);
    return this.partition(vaultId);
  }

  private partition(vaultId: string): Promise<Partition> {
    const cached = this.partitions.get(vaultId);
    if (cached) {
      // Re-insert to mark as most recently used
      this.partitions.delete(vaultId);
      this.partitions.set(vaultId, cached);
      return cached;
    }

    const loading = this.load(vaultId);
    this.partitions.set(vaultId, loading);
    loading.catch(() => {
      if (this.partitions.get(vaultId) === loading) {
        this.partitions.delete(vaultId);
      }
    });

    for (const oldest of this.partitions.keys()) {
      if (this.partitions.size <= this.config.maxCachedPartitions) break;
      this.partitions.delete(oldest);
    }
    return loading;
  }

  private async load(vaultId: string): Promise<Partition> {
    const partition = new Partition(this.hasher, this.config);
    const hints = await this.store.listEmbedded(vaultId);
    for (const hint of hints) {
      if (hint.embedding) {
        partition.upsert(toEntry(hint, hint.embedding));
      }
    }
    logger.debug(`[EmbeddingStore] Loaded ${partition.entries.size} vectors for vault ${shortId(vaultId)}`);
    return partition;
  }

  /**
   * Apply a stored hint to its partition if that partition is cached or loading.
   * An uncached partition picks the row up when it is first loaded.
   */
  private async applyToPartition(hint: HintDocument): Promise<void> {
    const loading = this.partitions.get(hint.vaultId);
    if (!loading) return;
    const partition = await loading;
    if (hint.embedding) {
      partition.upsert(toEntry(hint, hint.embedding));
    } else {
      partition.remove(hint.hintId);
    }
  }
}

function toEntry(hint: HintDocument, embedding: Vector): PartitionEntry {
  return {
    hintId: hint.hintId,
    text: hint.text,
    vector: Float64Array.from(embedding),
    isUsed: hint.isUsed,
    embeddedAt: hint.embeddedAt,
  };
}

function sameFingerprint(a: PartitionFingerprint, b: PartitionFingerprint): boolean {
  return a.embedded === b.embedded && a.used === b.used && a.latestEmbeddedAt === b.latestEmbeddedAt;
}
