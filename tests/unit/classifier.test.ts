import { describe, it, expect } from 'vitest';
import {
  classify,
  hasFeatureTag,
  languageKeywords,
  productType,
  resolveFeatureTagId,
  supportsLanguage,
} from '../../src/classifier';
import { ConfigurationError } from '../../src/errors';

describe('classifier', () => {
  describe('supportsLanguage', () => {
    it('matches the localized name inside a markup string', () => {
      const data = { supported_languages: 'English<strong>*</strong>, Simplified Chinese<strong>*</strong>' };
      expect(supportsLanguage(data, 'schinese')).toBe(true);
    });

    it('returns false when the language is not listed', () => {
      expect(supportsLanguage({ supported_languages: 'English, French, German' }, 'schinese')).toBe(false);
    });

    it('accepts arrays and language-keyed objects', () => {
      expect(supportsLanguage({ supported_languages: ['english', 'schinese'] }, 'schinese')).toBe(true);
      expect(supportsLanguage({ languages: { schinese: { supported: true } } }, 'schinese')).toBe(true);
    });

    it('tolerates absent and malformed fields', () => {
      expect(supportsLanguage({}, 'schinese')).toBe(false);
      expect(supportsLanguage({ supported_languages: 42 }, 'schinese')).toBe(false);
      expect(supportsLanguage({ supported_languages: null, languages: [7, null] }, 'schinese')).toBe(false);
    });

    it('falls back to the code for languages without a keyword list', () => {
      expect(languageKeywords('Polish')).toEqual(['polish']);
      expect(supportsLanguage({ supported_languages: 'English, Polish' }, 'polish')).toBe(true);
    });
  });

  describe('hasFeatureTag', () => {
    it('finds the category id for a named tag', () => {
      const data = { categories: [{ id: 2, description: 'Single-player' }, { id: 29, description: 'Steam Trading Cards' }] };
      expect(hasFeatureTag(data, 'trading-cards')).toBe(true);
      expect(hasFeatureTag(data, 'workshop')).toBe(false);
    });

    it('compares ids numerically', () => {
      expect(hasFeatureTag({ categories: [{ id: '29' }] }, 29)).toBe(true);
    });

    it('tolerates malformed categories', () => {
      expect(hasFeatureTag({ categories: 'Steam Trading Cards' }, 'trading-cards')).toBe(false);
      expect(hasFeatureTag({ categories: [null, 5, { description: 'Steam Trading Cards' }] }, 'trading-cards')).toBe(false);
      expect(hasFeatureTag({}, 'trading-cards')).toBe(false);
    });
  });

  describe('resolveFeatureTagId', () => {
    it('resolves names and numeric ids', () => {
      expect(resolveFeatureTagId('trading-cards')).toBe(29);
      expect(resolveFeatureTagId('Achievements')).toBe(22);
      expect(resolveFeatureTagId('41')).toBe(41);
    });

    it('rejects unknown tags', () => {
      expect(() => resolveFeatureTagId('jetpacks')).toThrow(ConfigurationError);
    });
  });

  describe('productType', () => {
    it('trims the type and defaults to unknown', () => {
      expect(productType({ type: ' game ' })).toBe('game');
      expect(productType({ type: '' })).toBe('unknown');
      expect(productType({ type: 3 })).toBe('unknown');
      expect(productType({})).toBe('unknown');
    });
  });

  describe('classify', () => {
    it('derives every field of the result', () => {
      const now = new Date('2024-06-01T12:00:00.000Z');
      const result = classify(
        440,
        {
          type: 'game',
          name: 'Test Game',
          supported_languages: 'English, Simplified Chinese',
          categories: [{ id: 29 }],
        },
        { language: 'schinese', featureTag: 'trading-cards' },
        now
      );

      expect(result).toEqual({
        appid: 440,
        name: 'Test Game',
        type: 'game',
        supportsLanguage: true,
        hasFeatureTag: true,
        lastChecked: '2024-06-01T12:00:00.000Z',
      });
    });

    it('classifies an empty payload as unknown with no tags', () => {
      const result = classify(9, {}, { language: 'schinese', featureTag: 'trading-cards' }, new Date(0));
      expect(result).toEqual({
        appid: 9,
        name: '',
        type: 'unknown',
        supportsLanguage: false,
        hasFeatureTag: false,
        lastChecked: '1970-01-01T00:00:00.000Z',
      });
    });
  });
});
