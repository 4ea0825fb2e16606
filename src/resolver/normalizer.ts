// ═══════════════════════════════════════════════════════════════════════════════
// NORMALIZER — Default Alias/Mention Normalization
// ═══════════════════════════════════════════════════════════════════════════════

import { applyCharFilters, foldToAscii } from '../search/analysis.js';
import type { Normalizer } from './types.js';

/**
 * Same character filters as the index analyzers, then lowercase, ASCII
 * folding and single spaces.
 *
 * @example
 * defaultNormalizer('  Café, Inc.™ ') // 'cafe inc'
 */
export const defaultNormalizer: Normalizer = text =>
  foldToAscii(applyCharFilters(text).toLowerCase())
    .replace(/\s+/gu, ' ')
    .trim();
