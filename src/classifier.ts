/**
 * Classification of detail payloads.
 *
 * The attribute bag is untrusted: every accessor tolerates absent fields and
 * unexpected shapes, and only reads what classification needs.
 */

import keywordTable from './data/classificationKeywords.json';
import { ConfigurationError } from './errors';
import { AppDetailsData, ClassificationResult } from './types';

const LANGUAGE_KEYWORDS: Record<string, string[]> = keywordTable.languages;
const FEATURE_TAG_IDS: Record<string, number> = keywordTable.featureTags;

export interface ClassifierOptions {
  language: string;
  featureTag: string;
}

/**
 * Keywords that indicate support for a language: its locale code plus the
 * common localized names. Unknown languages fall back to the code alone.
 */
export function languageKeywords(language: string): string[] {
  const code = language.toLowerCase();
  return LANGUAGE_KEYWORDS[code] ?? [code];
}

/**
 * Category id for a named feature tag, or a numeric id given directly.
 */
export function resolveFeatureTagId(tag: string): number {
  const known = FEATURE_TAG_IDS[tag.toLowerCase()];
  if (known !== undefined) return known;

  const numeric = Number(tag);
  if (Number.isInteger(numeric) && numeric > 0) return numeric;

  throw new ConfigurationError(`Unknown feature tag: ${tag}`, {
    known: Object.keys(FEATURE_TAG_IDS).join(','),
  });
}

export function productType(data: AppDetailsData): string {
  return typeof data.type === 'string' && data.type.trim() !== '' ? data.type.trim() : 'unknown';
}

export function appName(data: AppDetailsData): string {
  return typeof data.name === 'string' ? data.name : '';
}

/**
 * Flatten a field that may be a string, an array of strings, or an object
 * keyed by language into one lowercase haystack.
 */
function languageText(field: unknown): string {
  if (typeof field === 'string') {
    return field.toLowerCase();
  }
  if (Array.isArray(field)) {
    return field
      .filter((item): item is string => typeof item === 'string')
      .join(',')
      .toLowerCase();
  }
  if (field !== null && typeof field === 'object') {
    const parts: string[] = [];
    for (const [key, value] of Object.entries(field)) {
      parts.push(key);
      if (typeof value === 'string') parts.push(value);
    }
    return parts.join(',').toLowerCase();
  }
  return '';
}

export function supportsLanguage(data: AppDetailsData, language: string): boolean {
  const haystack = `${languageText(data.supported_languages)} ${languageText(data.languages)}`;
  if (haystack.trim() === '') return false;

  return languageKeywords(language).some((keyword) => haystack.includes(keyword.toLowerCase()));
}

export function hasFeatureTag(data: AppDetailsData, tag: string | number): boolean {
  const tagId = typeof tag === 'number' ? tag : resolveFeatureTagId(tag);
  if (!Array.isArray(data.categories)) return false;

  return data.categories.some((category: unknown) => {
    if (category === null || typeof category !== 'object' || !('id' in category)) {
      return false;
    }
    return Number(category.id) === tagId;
  });
}

export function classify(
  appid: number,
  data: AppDetailsData,
  options: ClassifierOptions,
  now: Date = new Date()
): ClassificationResult {
  return {
    appid,
    name: appName(data),
    type: productType(data),
    supportsLanguage: supportsLanguage(data, options.language),
    hasFeatureTag: hasFeatureTag(data, options.featureTag),
    lastChecked: now.toISOString(),
  };
}
