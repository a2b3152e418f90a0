/**
 * Routing Decision
 *
 * Decides whether recognised text is good enough to act on. Anything that
 * fails a check falls back to visual search.
 */

import type {
  BrowserConfig,
  ConsensusResult,
  RoutingDecision,
  SearchMode,
  ThresholdConfig,
} from '../0_types.js';

export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function countAlphanumeric(text: string): number {
  return (text.match(/[\p{L}\p{N}]/gu) ?? []).length;
}

/** Only digits and separators, or only one-character tokens */
export function isDegenerateText(normalized: string): boolean {
  if (/^[\d\s.,:;/+\-%()]+$/.test(normalized)) return true;
  const tokens = normalized.split(' ').filter(Boolean);
  return tokens.length > 0 && tokens.every((t) => [...t].length === 1);
}

export type RejectionReason =
  | 'empty'
  | 'too-short'
  | 'few-alphanumerics'
  | 'low-confidence'
  | 'degenerate';

/** Why the text would not be trusted, or null when it would */
export function rejectionReason(
  consensus: ConsensusResult,
  thresholds: ThresholdConfig
): RejectionReason | null {
  const text = normalizeText(consensus.text);
  if (!text) return 'empty';
  if ([...text].length < thresholds.minTextLength) return 'too-short';
  if (countAlphanumeric(text) < thresholds.minAlphanumeric) {
    return 'few-alphanumerics';
  }
  if (consensus.confidence < thresholds.minConfidence) return 'low-confidence';
  if (isDegenerateText(text)) return 'degenerate';
  return null;
}

export function routeResult(
  consensus: ConsensusResult,
  requestedMode: SearchMode,
  thresholds: ThresholdConfig
): RoutingDecision {
  if (requestedMode === 'visual-search') return 'visual-search';
  return rejectionReason(consensus, thresholds) === null
    ? requestedMode
    : 'visual-search';
}

/** URL for a text-carrying decision; the text is percent-encoded. */
export function buildSearchUrl(
  mode: Exclude<SearchMode, 'visual-search'>,
  text: string,
  options: Pick<BrowserConfig, 'translateTarget'>
): string {
  const normalized = normalizeText(text);

  switch (mode) {
    case 'text-search':
      return `https://www.google.com/search?${new URLSearchParams({ q: normalized })}`;
    case 'homework-search':
      return `https://www.google.com/search?${new URLSearchParams({ q: `solve ${normalized}` })}`;
    case 'translate':
      return `https://translate.google.com/?${new URLSearchParams({
        sl: 'auto',
        tl: options.translateTarget,
        text: normalized,
        op: 'translate',
      })}`;
  }
}
