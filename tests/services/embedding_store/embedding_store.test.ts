/**
 * @file Tests for EmbeddingStore: partitions, thresholds and the LSH index
 */

import { EmbeddingStore } from '../../../src/services/embedding_store';
import { createRng, HyperplaneHasher, LshIndex, probeCodes } from '../../../src/services/embedding_store/lsh_index';
import { checkVector, cosineSimilarity, normalize } from '../../../src/services/embedding_store/vector_math';
import { NotFoundError, ValidationError } from '../../../src/utils/errors';
import { InMemoryHintStore } from '../../fixtures/in_memory_stores';

function randomVectors(count: number, dimension: number, seed: number): number[][] {
  const rng = createRng(seed);
  return Array.from({ length: count }, () => Array.from({ length: dimension }, () => rng() * 2 - 1));
}

describe('vector math', () => {
  it('should clamp cosine similarity to [0, 1]', () => {
    expect(cosineSimilarity([1, 0, 0], [2, 0, 0])).toBe(1);
    expect(cosineSimilarity([1, 0, 0], [0, 1, 0])).toBe(0);
    expect(cosineSimilarity([1, 0, 0], [-1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0, 0], [1, 0, 0])).toBe(0);
  });

  it('should normalise to unit length', () => {
    expect(normalize([3, 4])).toEqual([0.6, 0.8]);
  });

  it('should reject malformed vectors', () => {
    expect(checkVector([1, 2], 3)).toEqual({ field: 'embedding', message: 'expected 3 dimensions, got 2' });
    expect(checkVector([0, 0, 0], 3)).toEqual({ field: 'embedding', message: 'zero vector has no direction' });
    expect(checkVector([1, Number.NaN, 0], 3)).toEqual({ field: 'embedding', message: 'contains a non-finite value' });
    expect(checkVector('nope', 3)).toEqual({ field: 'embedding', message: 'must be an array of numbers' });
    expect(checkVector([1, 0, 0], 3)).toBeNull();
  });
});

describe('LSH index', () => {
  it('should search every code within the radius', () => {
    expect(probeCodes(0b000, 3, 1)).toEqual([0b000, 0b001, 0b010, 0b100]);
    expect(new Set(probeCodes(0b101, 3, 2)).size).toBe(7);
  });

  it('should hash deterministically for a seed', () => {
    const a = new HyperplaneHasher(4, { tables: 2, hyperplanes: 6, seed: 7 });
    const b = new HyperplaneHasher(4, { tables: 2, hyperplanes: 6, seed: 7 });
    expect(a.codes([0.1, -0.4, 0.3, 0.9])).toEqual(b.codes([0.1, -0.4, 0.3, 0.9]));
  });

  it('should always return an identical vector as a candidate', () => {
    const hasher = new HyperplaneHasher(8, { tables: 4, hyperplanes: 8, seed: 1 });
    const index = new LshIndex(hasher, 0);
    const vectors = randomVectors(50, 8, 3);
    vectors.forEach((v, i) => index.add(`h-${i}`, v));

    for (let i = 0; i < vectors.length; i++) {
      expect(index.candidates(vectors[i]).has(`h-${i}`)).toBe(true);
    }

    index.remove('h-0');
    expect(index.candidates(vectors[0]).has('h-0')).toBe(false);
    expect(index.size).toBe(49);
  });
});

describe('EmbeddingStore', () => {
  let hints: InMemoryHintStore;
  let store: EmbeddingStore;

  beforeEach(() => {
    hints = new InMemoryHintStore();
    store = new EmbeddingStore(hints, { dimension: 3 });
  });

  it('should return matches most similar first, ties by hint id', async () => {
    const near = await store.insert({ vaultId: 'v-1', text: 'loves ramen', source: 'text_input', embedding: [1, 0.1, 0] });
    const far = await store.insert({ vaultId: 'v-1', text: 'owns a kayak', source: 'text_input', embedding: [0, 1, 0] });
    const exact = await store.insert({ vaultId: 'v-1', text: 'ramen again', source: 'text_input', embedding: [2, 0, 0] });

    const matches = await store.query('v-1', [1, 0, 0]);

    expect(matches.map((m) => m.hintId)).toEqual([exact.hintId, near.hintId, far.hintId]);
    expect(matches[0].similarity).toBe(1);
    expect(matches[2].similarity).toBe(0);
  });

  it('should include a match exactly at the threshold', async () => {
    const hint = await store.insert({ vaultId: 'v-1', text: 'tea', source: 'text_input', embedding: [1, 0, 0] });
    await store.insert({ vaultId: 'v-1', text: 'hiking', source: 'text_input', embedding: [0, 0, 1] });

    const matches = await store.query('v-1', [1, 0, 0], { threshold: 1 });

    expect(matches.map((m) => m.hintId)).toEqual([hint.hintId]);
  });

  it('should never mix vaults', async () => {
    await store.insert({ vaultId: 'v-2', text: 'other', source: 'text_input', embedding: [1, 0, 0] });
    expect(await store.query('v-1', [1, 0, 0])).toEqual([]);
  });

  it('should pick up a hint once its embedding arrives, without a re-index', async () => {
    const pending = await store.insert({ vaultId: 'v-1', text: 'wants a record player', source: 'voice_transcription' });
    expect(await store.query('v-1', [0, 0, 1])).toEqual([]);

    await store.setEmbedding(pending.hintId, [0, 0, 5], new Date('2025-05-01T00:00:00.000Z'));

    const matches = await store.query('v-1', [0, 0, 1]);
    expect(matches.map((m) => m.hintId)).toEqual([pending.hintId]);
    expect((await hints.findById(pending.hintId))?.embedding).toEqual([0, 0, 1]);
  });

  it('should drop a hint whose embedding is cleared', async () => {
    const hint = await store.insert({ vaultId: 'v-1', text: 'tea', source: 'text_input', embedding: [1, 0, 0] });
    expect(await store.query('v-1', [1, 0, 0])).toHaveLength(1);

    await store.setEmbedding(hint.hintId, null);

    expect(await store.query('v-1', [1, 0, 0])).toEqual([]);
  });

  it('should hide used hints unless asked', async () => {
    const hint = await store.insert({ vaultId: 'v-1', text: 'tea', source: 'text_input', embedding: [1, 0, 0] });
    await store.query('v-1', [1, 0, 0]);

    expect(await store.markUsed('v-1', [hint.hintId])).toBe(1);

    expect(await store.query('v-1', [1, 0, 0])).toEqual([]);
    const withUsed = await store.query('v-1', [1, 0, 0], { includeUsed: true });
    expect(withUsed.map((m) => m.isUsed)).toEqual([true]);
  });

  it('should validate vector dimension', async () => {
    await expect(
      store.insert({ vaultId: 'v-1', text: 'tea', source: 'text_input', embedding: [1, 0] })
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(store.query('v-1', [1, 0, 0, 0])).rejects.toBeInstanceOf(ValidationError);
  });

  it('should reject an embedding for an unknown hint', async () => {
    await expect(store.setEmbedding('missing', [1, 0, 0])).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should delete every hint of a vault', async () => {
    await store.insert({ vaultId: 'v-1', text: 'a', source: 'text_input', embedding: [1, 0, 0] });
    await store.insert({ vaultId: 'v-1', text: 'b', source: 'text_input' });
    await store.query('v-1', [1, 0, 0]);

    expect(await store.deleteVault('v-1')).toBe(2);
    expect(await store.query('v-1', [1, 0, 0])).toEqual([]);
  });

  describe('with storage shared by several instances', () => {
    let writer: EmbeddingStore;

    beforeEach(() => {
      writer = new EmbeddingStore(hints, { dimension: 3 });
    });

    it('should see a hint inserted by another instance', async () => {
      expect(await store.query('v-1', [1, 0, 0])).toEqual([]);

      const hint = await writer.insert({ vaultId: 'v-1', text: 'tea', source: 'text_input', embedding: [1, 0, 0] });

      const matches = await store.query('v-1', [1, 0, 0]);
      expect(matches.map((m) => m.hintId)).toEqual([hint.hintId]);
    });

    it('should see an embedding backfilled by another instance', async () => {
      const pending = await store.insert({ vaultId: 'v-1', text: 'wants a record player', source: 'text_input' });
      expect(await store.query('v-1', [0, 0, 1])).toEqual([]);

      await writer.setEmbedding(pending.hintId, [0, 0, 2], new Date('2025-05-01T00:00:00.000Z'));

      expect((await store.query('v-1', [0, 0, 1])).map((m) => m.hintId)).toEqual([pending.hintId]);
    });

    it('should follow hints marked used or cleared elsewhere', async () => {
      const used = await store.insert({ vaultId: 'v-1', text: 'tea', source: 'text_input', embedding: [1, 0, 0] });
      const cleared = await store.insert({ vaultId: 'v-1', text: 'kayak', source: 'text_input', embedding: [0, 1, 0] });
      expect(await store.query('v-1', [1, 1, 0])).toHaveLength(2);

      await writer.markUsed('v-1', [used.hintId]);
      expect((await store.query('v-1', [1, 1, 0])).map((m) => m.hintId)).toEqual([cleared.hintId]);

      await writer.setEmbedding(cleared.hintId, null);
      expect(await store.query('v-1', [1, 1, 0])).toEqual([]);
    });

    it('should not reload for its own writes', async () => {
      const load = jest.spyOn(hints, 'listEmbedded');
      await store.query('v-1', [1, 0, 0]);

      await store.insert({ vaultId: 'v-1', text: 'tea', source: 'text_input', embedding: [1, 0, 0] });
      expect(await store.query('v-1', [1, 0, 0])).toHaveLength(1);

      expect(load).toHaveBeenCalledTimes(1);
    });
  });

  it('should evict the least recently queried partition', async () => {
    const bounded = new EmbeddingStore(hints, { dimension: 3, maxCachedPartitions: 2 });
    const load = jest.spyOn(hints, 'listEmbedded');

    await bounded.query('v-1', [1, 0, 0]);
    await bounded.query('v-2', [1, 0, 0]);
    await bounded.query('v-3', [1, 0, 0]);
    await bounded.query('v-2', [1, 0, 0]);
    await bounded.query('v-1', [1, 0, 0]);

    expect(load.mock.calls.map(([vaultId]) => vaultId)).toEqual(['v-1', 'v-2', 'v-3', 'v-1']);
  });

  describe('with an LSH-indexed partition', () => {
    const dimension = 16;
    let indexed: EmbeddingStore;
    let vectors: number[][];
    let ids: string[];

    beforeEach(async () => {
      indexed = new EmbeddingStore(new InMemoryHintStore(), {
        dimension,
        linearScanThreshold: 20,
        tables: 6,
        hyperplanes: 8,
        probeRadius: 1,
        seed: 11,
      });
      vectors = randomVectors(60, dimension, 5);
      ids = [];
      for (const [i, embedding] of vectors.entries()) {
        const hint = await indexed.insert({ vaultId: 'v-1', text: `hint ${i}`, source: 'text_input', embedding });
        ids.push(hint.hintId);
      }
    });

    it('should switch to the index past the threshold', async () => {
      expect(await indexed.partitionStats('v-1')).toEqual({ rows: 60, indexed: true });
    });

    it('should agree with an exact scan on the nearest stored vector', async () => {
      for (const i of [0, 17, 42, 59]) {
        const approximate = await indexed.query('v-1', vectors[i], { limit: 1 });
        const exact = await indexed.query('v-1', vectors[i], { limit: 1, exact: true });
        expect(approximate[0].hintId).toBe(ids[i]);
        expect(exact[0].hintId).toBe(ids[i]);
      }
    });

    it('should index new hints incrementally', async () => {
      expect(await indexed.partitionStats('v-1')).toEqual({ rows: 60, indexed: true });
      const embedding = randomVectors(1, dimension, 99)[0];
      const added = await indexed.insert({ vaultId: 'v-1', text: 'late hint', source: 'text_input', embedding });

      const matches = await indexed.query('v-1', embedding, { limit: 1 });

      expect(matches[0].hintId).toBe(added.hintId);
      expect(await indexed.partitionStats('v-1')).toEqual({ rows: 61, indexed: true });
    });
  });
});
