/**
 * @file Candidate source backed by the bundled catalog file. Entries with an
 * unknown type are dropped at load.
 */

import catalog from '../../data/candidate_catalog.json';
import { logger } from '../../utils/logger';
import { RECOMMENDATION_TYPES } from '../../models/recommendation';
import { LOVE_LANGUAGES, VIBE_TAGS, isMemberOf, type LoveLanguage, type VibeTag } from '../../models/vault';
import type { Candidate, CandidateRequest, CandidateSource } from './models';

interface CatalogEntry {
  candidateId: string;
  type: string;
  title: string;
  description?: string;
  externalUrl?: string;
  priceCents?: number;
  merchantName?: string;
  interests?: string[];
  vibes?: string[];
  loveLanguages?: string[];
}

export function parseCatalog(entries: readonly CatalogEntry[]): Candidate[] {
  const candidates: Candidate[] = [];
  for (const entry of entries) {
    if (!isMemberOf(RECOMMENDATION_TYPES, entry.type)) {
      logger.warn(`[CandidateCatalog] Skipping ${entry.candidateId}: unknown type ${entry.type}`);
      continue;
    }
    candidates.push({
      candidateId: entry.candidateId,
      type: entry.type,
      title: entry.title,
      description: entry.description,
      externalUrl: entry.externalUrl,
      priceCents: entry.priceCents,
      merchantName: entry.merchantName,
      interests: entry.interests,
      vibes: entry.vibes?.filter((v): v is VibeTag => isMemberOf(VIBE_TAGS, v)),
      loveLanguages: entry.loveLanguages?.filter((l): l is LoveLanguage => isMemberOf(LOVE_LANGUAGES, l)),
      embedding: null,
    });
  }
  return candidates;
}

export class CatalogCandidateSource implements CandidateSource {
  private readonly candidates: Candidate[];

  constructor(entries: readonly CatalogEntry[] = catalog) {
    this.candidates = parseCatalog(entries);
  }

  async candidatesFor(request: CandidateRequest): Promise<Candidate[]> {
    const excluded = new Set(request.excludeCandidateIds ?? []);
    return this.candidates.filter((c) => !excluded.has(c.candidateId)).slice(0, request.limit);
  }
}
