/**
 * @file Hint intake: store first, embed second. A hint whose embedding could
 * not be computed stays usable for chronological listing and is picked up by
 * the backfill.
 */

import { logger, errorMessage, shortId } from '../../utils/logger';
import { ValidationError } from '../../utils/errors';
import type { HintDraft } from '../../models/validation';
import type { EmbeddingProvider } from './embedding_client';
import type { EmbeddingStore } from './index';
import type { HintDocument, SimilarityMatch, SimilarityQueryOptions } from './models';

export interface HintSearchResult {
  mode: 'semantic' | 'chronological';
  hints: Array<Pick<SimilarityMatch, 'hintId' | 'text' | 'isUsed'> & { similarity: number | null }>;
}

export interface BackfillResult {
  attempted: number;
  embedded: number;
}

export class HintService {
  constructor(
    private readonly embeddings: EmbeddingStore,
    private readonly provider: EmbeddingProvider
  ) {}

  async addHint(draft: HintDraft): Promise<HintDocument> {
    const hint = await this.embeddings.insert({ ...draft, embedding: null });
    const vector = await this.provider.embed(draft.text);
    if (!vector) {
      return hint;
    }
    return this.attach(hint, vector);
  }

  /**
   * Retry embedding for hints still missing a vector, oldest first.
   */
  async backfillEmbeddings(limit = 100): Promise<BackfillResult> {
    const pending = await this.embeddings.listMissingEmbeddings(limit);
    let embedded = 0;

    for (const hint of pending) {
      const vector = await this.provider.embed(hint.text);
      if (!vector) continue;
      const updated = await this.attach(hint, vector);
      if (updated.embedding) embedded++;
    }

    if (pending.length > 0) {
      logger.info(`[HintService] Backfill embedded ${embedded}/${pending.length} hints`);
    }
    return { attempted: pending.length, embedded };
  }

  /**
   * Semantic search when the query text can be embedded, newest-first listing
   * otherwise.
   */
  async search(
    vaultId: string,
    queryText: string,
    options: SimilarityQueryOptions = {}
  ): Promise<HintSearchResult> {
    const vector = await this.provider.embed(queryText);
    if (vector) {
      const matches = await this.embeddings.query(vaultId, vector, options);
      return {
        mode: 'semantic',
        hints: matches.map((m) => ({ hintId: m.hintId, text: m.text, isUsed: m.isUsed, similarity: m.similarity })),
      };
    }

    const recent = await this.embeddings.listRecent(vaultId, {
      includeUsed: options.includeUsed,
      limit: options.limit ?? 10,
    });
    return {
      mode: 'chronological',
      hints: recent.map((h) => ({ hintId: h.hintId, text: h.text, isUsed: h.isUsed, similarity: null })),
    };
  }

  private async attach(hint: HintDocument, vector: number[]): Promise<HintDocument> {
    try {
      return await this.embeddings.setEmbedding(hint.hintId, vector);
    } catch (error) {
      // A malformed vector from the collaborator leaves the hint pending
      if (error instanceof ValidationError) {
        logger.warn(`[HintService] Rejected embedding for hint ${shortId(hint.hintId)}: ${errorMessage(error)}`);
        return hint;
      }
      throw error;
    }
  }
}
