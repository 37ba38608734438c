/**
 * @file Attribute inference for items that arrive without explicit tags.
 * Keyword tables live in data/catalog.json.
 */

import catalog from '../data/catalog.json';
import { INTEREST_CATEGORIES, LOVE_LANGUAGES, VIBE_TAGS, isMemberOf, type LoveLanguage, type VibeTag } from './vault';
import type { RecommendationType } from './recommendation';

const VIBE_KEYWORDS: Record<VibeTag, string[]> = catalog.vibeKeywords;
const LOVE_LANGUAGE_KEYWORDS: Partial<Record<LoveLanguage, string[]>> = catalog.loveLanguageKeywords;

const TYPE_LOVE_LANGUAGE: Record<RecommendationType, LoveLanguage | null> = {
  gift: 'receiving_gifts',
  experience: 'quality_time',
  date: 'quality_time',
  idea: null,
};

export interface AttributedItem {
  type: RecommendationType;
  title: string;
  description?: string;
  interests?: string[];
  vibes?: VibeTag[];
  loveLanguages?: LoveLanguage[];
}

export interface ResolvedAttributes {
  interests: string[];
  vibes: VibeTag[];
  loveLanguages: LoveLanguage[];
}

const patternCache = new Map<string, RegExp>();

function pattern(keyword: string): RegExp {
  let compiled = patternCache.get(keyword);
  if (!compiled) {
    const escaped = keyword.toLowerCase().replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    compiled = new RegExp(`\\b${escaped}(s|es)?\\b`);
    patternCache.set(keyword, compiled);
  }
  return compiled;
}

function mentions(text: string, keyword: string): boolean {
  return pattern(keyword).test(text);
}

function itemText(item: Pick<AttributedItem, 'title' | 'description'>): string {
  return `${item.title} ${item.description ?? ''}`.toLowerCase();
}

export function inferInterests(text: string): string[] {
  const lower = text.toLowerCase();
  return INTEREST_CATEGORIES.filter((category) => mentions(lower, category));
}

export function inferVibes(text: string): VibeTag[] {
  const lower = text.toLowerCase();
  const found: VibeTag[] = [];
  for (const [vibe, keywords] of Object.entries(VIBE_KEYWORDS)) {
    if (isMemberOf(VIBE_TAGS, vibe) && keywords.some((k) => mentions(lower, k))) {
      found.push(vibe);
    }
  }
  return found;
}

/**
 * Type-implied language first, then keyword matches.
 */
export function inferLoveLanguages(type: RecommendationType, text: string): LoveLanguage[] {
  const lower = text.toLowerCase();
  const found: LoveLanguage[] = [];
  const implied = TYPE_LOVE_LANGUAGE[type];
  if (implied) found.push(implied);

  for (const [language, keywords] of Object.entries(LOVE_LANGUAGE_KEYWORDS)) {
    if (
      isMemberOf(LOVE_LANGUAGES, language) &&
      !found.includes(language) &&
      keywords?.some((k) => mentions(lower, k))
    ) {
      found.push(language);
    }
  }
  return found;
}

/**
 * Explicit tags win per dimension; an empty or missing dimension is inferred.
 */
export function resolveAttributes(item: AttributedItem): ResolvedAttributes {
  const text = itemText(item);
  return {
    interests: item.interests && item.interests.length > 0 ? item.interests : inferInterests(text),
    vibes: item.vibes && item.vibes.length > 0 ? item.vibes : inferVibes(text),
    loveLanguages:
      item.loveLanguages && item.loveLanguages.length > 0
        ? item.loveLanguages
        : inferLoveLanguages(item.type, text),
  };
}
