/**
 * @file Recommendation Scorer
 *
 * Ranks catalog candidates for a vault using its static preferences, the
 * latest learned weight snapshot and contextual hints from the embedding
 * store. Ranking is read-only. Hints are consumed only by confirmSelection.
 */

import { v4 as uuidv4 } from 'uuid';
import { logger, shortId } from '../../utils/logger';
import { NotFoundError, ValidationError } from '../../utils/errors';
import { assertValid, validateFeedback, type FeedbackInput } from '../../models/validation';
import { isMemberOf, VIBE_TAGS, type VaultDocument, type VibeTag } from '../../models/vault';
import type { FeedbackDocument, RecommendationDocument } from '../../models/recommendation';
import type { EmbeddingStore } from '../embedding_store';
import type { FeedbackStore, RecommendationStore } from '../recommendation_store/models';
import type { VaultStore } from '../vault_service/models';
import type { WeightStore } from '../weight_learner/models';
import { rankCandidates, type ScoringContext } from './scorer';
import {
  DEFAULT_SCORER_CONFIG,
  type Candidate,
  type CandidateSource,
  type RankingResult,
  type ScorerConfig,
  type ScoringOptions,
  type ScoredCandidate,
} from './models';

export * from './models';
export { rankCandidates, scoreCandidate, dimensionScore, compareScored } from './scorer';

export interface RecommendationServiceDeps {
  vaults: Pick<VaultStore, 'findById'>;
  weights: Pick<WeightStore, 'get'>;
  embeddings: EmbeddingStore;
  recommendations: RecommendationStore;
  feedback: FeedbackStore;
  candidates?: CandidateSource;
}

export interface GenerateRequest extends ScoringOptions {
  vaultId: string;
  candidates: Candidate[];
  milestoneId?: string | null;
  notificationId?: string | null;
  limit: number;
}

export interface RefreshRequest {
  vaultId: string;
  userId: string;
  milestoneId?: string | null;
  /** Recommendations the user rejected; each gets `refreshed` feedback */
  rejectedRecommendationIds: string[];
  vibeOverride?: string[];
  limit?: number;
}

export class RecommendationService {
  readonly config: ScorerConfig;

  constructor(
    private readonly deps: RecommendationServiceDeps,
    config: Partial<ScorerConfig> = {}
  ) {
    this.config = { ...DEFAULT_SCORER_CONFIG, ...config };
  }

  /**
   * Score and order candidates for a vault. Excluded candidates are reported
   * with their reason.
   */
  async rank(vaultId: string, candidates: Candidate[], options: ScoringOptions = {}): Promise<RankingResult> {
    return this.rankFor(await this.requireVault(vaultId), candidates, options);
  }

  /**
   * Rank and persist the top `limit` candidates as recommendations.
   */
  async generate(request: GenerateRequest, now: Date = new Date()): Promise<RecommendationDocument[]> {
    const vault = await this.requireVault(request.vaultId);
    const { ranked, excluded } = await this.rankFor(vault, request.candidates, request);
    const top = ranked.slice(0, request.limit);
    const documents = top.map((scored) =>
      toDocument(scored, {
        vaultId: vault.vaultId,
        userId: vault.userId,
        milestoneId: request.milestoneId ?? null,
        notificationId: request.notificationId ?? null,
        createdAt: now.toISOString(),
      })
    );

    await this.deps.recommendations.insertMany(documents);
    logger.info(
      `[RecommendationScorer] Generated ${documents.length} recommendations for vault ${shortId(vault.vaultId)} (${excluded.length} excluded)`
    );
    return documents;
  }

  /**
   * Record `refreshed` feedback for the rejected set and generate a new one.
   * A vibe override applies to this call only.
   */
  async refresh(request: RefreshRequest, now: Date = new Date()): Promise<RecommendationDocument[]> {
    const source = this.deps.candidates;
    if (!source) {
      throw new Error('No candidate source configured');
    }

    const vibeOverride = this.parseVibeOverride(request.vibeOverride);
    const rejected = await this.deps.recommendations.findByIds(request.rejectedRecommendationIds);
    for (const recommendation of rejected) {
      if (recommendation.userId !== request.userId || recommendation.vaultId !== request.vaultId) {
        throw new NotFoundError('Recommendation', recommendation.recommendationId);
      }
    }
    for (const recommendation of rejected) {
      await this.deps.feedback.append({
        feedbackId: uuidv4(),
        recommendationId: recommendation.recommendationId,
        userId: request.userId,
        action: 'refreshed',
        createdAt: now.toISOString(),
      });
    }

    const limit = request.limit ?? 3;
    const candidates = await source.candidatesFor({
      vaultId: request.vaultId,
      milestoneId: request.milestoneId ?? null,
      limit: limit * 4,
      excludeCandidateIds: rejected.map((r) => r.candidateId),
    });

    return this.generate(
      {
        vaultId: request.vaultId,
        candidates,
        milestoneId: request.milestoneId ?? null,
        vibeOverride,
        limit,
      },
      now
    );
  }

  /**
   * Validate and append a feedback event. The recommendation must belong to the
   * user. Scoring is unaffected until the next learner run.
   */
  async recordFeedback(input: FeedbackInput, now: Date = new Date()): Promise<FeedbackDocument> {
    const draft = assertValid(validateFeedback(input));
    await this.ownedRecommendation(draft.recommendationId, draft.userId);

    const feedback: FeedbackDocument = {
      feedbackId: uuidv4(),
      ...draft,
      createdAt: now.toISOString(),
    };
    await this.deps.feedback.append(feedback);
    logger.debug(`[RecommendationScorer] Feedback ${feedback.action} on ${shortId(draft.recommendationId)}`);
    return feedback;
  }

  /**
   * The user picked this recommendation: record `selected` and consume the
   * hints that boosted it. Confirming again reuses the recorded feedback.
   */
  async confirmSelection(
    recommendationId: string,
    userId: string,
    now: Date = new Date()
  ): Promise<{ feedback: FeedbackDocument; hintsConsumed: number }> {
    const recommendation = await this.ownedRecommendation(recommendationId, userId);
    const previous = await this.deps.feedback.listByUser(userId);
    const feedback =
      previous.find((entry) => entry.recommendationId === recommendationId && entry.action === 'selected') ??
      (await this.recordFeedback({ recommendationId, userId, action: 'selected' }, now));
    const hintsConsumed = await this.deps.embeddings.markUsed(recommendation.vaultId, recommendation.hintIds);

    logger.info(
      `[RecommendationScorer] Selection confirmed for ${shortId(recommendationId)}, ${hintsConsumed} hints consumed`
    );
    return { feedback, hintsConsumed };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async requireVault(vaultId: string): Promise<VaultDocument> {
    const vault = await this.deps.vaults.findById(vaultId);
    if (!vault) {
      throw new NotFoundError('Vault', vaultId);
    }
    return vault;
  }

  private async rankFor(vault: VaultDocument, candidates: Candidate[], options: ScoringOptions): Promise<RankingResult> {
    const context: ScoringContext = {
      vault,
      weights: await this.deps.weights.get(vault.userId),
      budgetTier: options.budgetTier,
      vibeOverride: options.vibeOverride,
      hintMatches: await this.matchHints(vault.vaultId, candidates),
    };
    return rankCandidates(candidates, context, this.config);
  }

  private async ownedRecommendation(recommendationId: string, userId: string): Promise<RecommendationDocument> {
    const recommendation = await this.deps.recommendations.findById(recommendationId);
    if (!recommendation || recommendation.userId !== userId) {
      throw new NotFoundError('Recommendation', recommendationId);
    }
    return recommendation;
  }

  /**
   * Unused hints whose similarity to each candidate's embedding exceeds the
   * threshold. Candidates without an embedding get no bonus.
   */
  private async matchHints(vaultId: string, candidates: Candidate[]): Promise<Map<string, string[]>> {
    const matches = new Map<string, string[]>();
    for (const candidate of candidates) {
      if (!candidate.embedding) continue;
      const similar = await this.deps.embeddings.query(vaultId, candidate.embedding, {
        threshold: this.config.hintSimilarityThreshold,
        limit: this.config.hintsPerCandidate,
        includeUsed: false,
      });
      const hintIds = similar
        .filter((match) => match.similarity > this.config.hintSimilarityThreshold)
        .map((match) => match.hintId);
      if (hintIds.length > 0) {
        matches.set(candidate.candidateId, hintIds);
      }
    }
    return matches;
  }

  private parseVibeOverride(vibes: string[] | undefined): VibeTag[] | undefined {
    if (!vibes || vibes.length === 0) return undefined;
    const parsed: VibeTag[] = [];
    for (const vibe of vibes) {
      if (!isMemberOf(VIBE_TAGS, vibe)) {
        throw new ValidationError([{ field: 'vibeOverride', message: `unknown vibe tag: ${vibe}` }]);
      }
      if (!parsed.includes(vibe)) parsed.push(vibe);
    }
    return parsed;
  }
}

function toDocument(
  scored: ScoredCandidate,
  link: Pick<RecommendationDocument, 'vaultId' | 'userId' | 'milestoneId' | 'notificationId' | 'createdAt'>
): RecommendationDocument {
  const { candidate } = scored;
  return {
    recommendationId: uuidv4(),
    ...link,
    candidateId: candidate.candidateId,
    type: candidate.type,
    title: candidate.title,
    description: candidate.description,
    externalUrl: candidate.externalUrl,
    priceCents: candidate.priceCents,
    merchantName: candidate.merchantName,
    scores: scored.scores,
    matchedInterests: scored.matchedInterests,
    matchedVibes: scored.matchedVibes,
    matchedLoveLanguages: scored.matchedLoveLanguages,
    hintIds: scored.hintIds,
  };
}
export { CatalogCandidateSource, parseCatalog } from './candidate_source';
