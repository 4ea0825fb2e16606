// ═══════════════════════════════════════════════════════════════════════════════
// TEXT ANALYSIS — Character Filters, Folding, Analyzers
// ═══════════════════════════════════════════════════════════════════════════════

import type { AnalysisSettings, AnalyzerName } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// CHARACTER FILTERS
// ─────────────────────────────────────────────────────────────────────────────────

interface CharFilter {
  readonly name: string;
  readonly pattern: RegExp;
  readonly replacement: string;
}

/**
 * Applied in order, before tokenization, by every analyzer.
 */
export const CHAR_FILTERS: readonly CharFilter[] = [
  { name: 'remove_comma', pattern: /,/gu, replacement: '' },
  { name: 'remove_tm_and_r', pattern: /™|®/gu, replacement: '' },
  { name: 'remove_loose_apostrophes', pattern: / '|' /gu, replacement: '' },
  { name: 'space_possessive_apostrophes', pattern: /([^\p{N}\s]+)'s /gu, replacement: "$1 's " },
  { name: 'remove_special_beginning', pattern: /^[^\p{L}\p{N}\p{Sc}&']+/u, replacement: '' },
  { name: 'remove_special_end', pattern: /[^\p{L}\p{N}&']+$/u, replacement: '' },
  { name: 'remove_special1', pattern: /(\p{L}+)[^\p{L}\p{N}&']+(?=[\p{N}\s]+)/gu, replacement: '$1 ' },
  { name: 'remove_special2', pattern: /(\p{N}+)[^\p{L}\p{N}&']+(?=[\p{L}\s]+)/gu, replacement: '$1 ' },
  { name: 'remove_special3', pattern: /(\p{L}+)[^\p{L}\p{N}&']+(?=\p{L}+)/gu, replacement: '$1 ' },
];

export function applyCharFilters(text: string): string {
  let result = text;
  for (const filter of CHAR_FILTERS) {
    result = result.replace(filter.pattern, filter.replacement);
  }
  return result;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ASCII FOLDING
// ─────────────────────────────────────────────────────────────────────────────────

// Letters that carry no combining mark under NFKD
const FOLD_MAP: Readonly<Record<string, string>> = {
  'ß': 'ss',
  'æ': 'ae',
  'œ': 'oe',
  'ø': 'o',
  'đ': 'd',
  'ł': 'l',
  'þ': 'th',
};

/**
 * Strip diacritics and map the remaining non-ASCII Latin letters. Expects
 * lowercased input.
 */
export function foldToAscii(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/\p{M}/gu, '')
    .replace(/[ßæœøđłþ]/gu, ch => FOLD_MAP[ch] ?? ch);
}

// ─────────────────────────────────────────────────────────────────────────────────
// DEFAULTS
// ─────────────────────────────────────────────────────────────────────────────────

export const DEFAULT_ANALYSIS_SETTINGS: AnalysisSettings = {
  shingle: {
    minShingleSize: 2,
    maxShingleSize: 4,
    outputUnigrams: true,
  },
  edgeNGram: {
    minGram: 4,
    maxGram: 20,
  },
};

// ─────────────────────────────────────────────────────────────────────────────────
// ANALYZER
// ─────────────────────────────────────────────────────────────────────────────────

export class Analyzer {
  private readonly name: AnalyzerName;
  private readonly settings: AnalysisSettings;

  constructor(name: AnalyzerName, settings: AnalysisSettings = DEFAULT_ANALYSIS_SETTINGS) {
    this.name = name;
    this.settings = settings;
  }

  /**
   * Turn text into index/query terms.
   */
  analyze(text: string): string[] {
    const filtered = applyCharFilters(text);

    switch (this.name) {
      case 'keyword_match': {
        const token = foldToAscii(filtered.toLowerCase()).replace(/\s+/gu, ' ').trim();
        return token.length > 0 ? [token] : [];
      }

      case 'default':
        return this.shingles(this.words(filtered));

      case 'char_ngram':
        return this.words(filtered).flatMap(word => this.edgeNGrams(word));
    }
  }

  private words(text: string): string[] {
    return text
      .split(/\s+/u)
      .filter(Boolean)
      .map(word => foldToAscii(word.toLowerCase()));
  }

  /**
   * Word shingles starting at each position, with or without the unigram.
   */
  private shingles(words: string[]): string[] {
    const { minShingleSize, maxShingleSize, outputUnigrams } = this.settings.shingle;
    const tokens: string[] = [];

    for (let i = 0; i < words.length; i++) {
      if (outputUnigrams) {
        tokens.push(words[i] ?? '');
      }
      for (let size = minShingleSize; size <= maxShingleSize && i + size <= words.length; size++) {
        tokens.push(words.slice(i, i + size).join(' '));
      }
    }

    return tokens;
  }

  /**
   * Prefixes of length minGram..maxGram; words shorter than minGram yield nothing.
   */
  private edgeNGrams(word: string): string[] {
    const { minGram, maxGram } = this.settings.edgeNGram;
    const grams: string[] = [];

    for (let n = minGram; n <= Math.min(maxGram, word.length); n++) {
      grams.push(word.slice(0, n));
    }

    return grams;
  }
}
